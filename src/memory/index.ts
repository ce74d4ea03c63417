#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createConfig, loadConfig, type MemoryConfig } from './src/config.js';
import { ConfigurationError } from './src/errors.js';
import { KnowledgeGraphManager } from './src/knowledge-graph-manager.js';
import { createLogger } from './src/logger.js';
import { connectMongo } from './src/mongo-backend.js';
import { createMemoryServer, SERVER_VERSION } from './src/server.js';
import { StorageManager } from './src/storage-manager.js';

// Invalid settings leave the store unconfigured instead of stopping the server
async function openStorage(): Promise<StorageManager> {
  let config: MemoryConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      config = createConfig();
      return StorageManager.unconfigured(config, error, createLogger("mongo-memory", config.logLevel));
    }
    throw error;
  }
  return StorageManager.open(config, {
    connect: connectMongo,
    logger: createLogger("mongo-memory", config.logLevel),
  });
}

async function main() {
  const storage = await openStorage();
  const logger = createLogger("mongo-memory", storage.config.logLevel);
  const knowledgeGraphManager = new KnowledgeGraphManager(storage);
  const server = createMemoryServer(knowledgeGraphManager, logger);

  const shutdown = async () => {
    await server.close();
    await knowledgeGraphManager.close();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((error) => {
      logger.error("Shutdown failed", { error: String(error) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("MongoDB memory MCP server running on stdio", {
    version: SERVER_VERSION,
    configured: storage.isConfigured(),
  });
}

main().catch((error) => {
  console.error("Fatal error in main():", error);
  process.exit(1);
});
