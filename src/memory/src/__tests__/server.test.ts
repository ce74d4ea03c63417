import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { KnowledgeGraphManager, SERVER_INSTRUCTIONS } from '../knowledge-graph-manager.js';
import { createMemoryServer, SERVER_NAME, SERVER_VERSION } from '../server.js';
import { openTestStorage } from './helpers/test-storage.js';

describe("memory server", () => {
  let client: Client;
  let close: () => Promise<void>;

  beforeEach(async () => {
    const { storage } = await openTestStorage();
    const server = createMemoryServer(new KnowledgeGraphManager(storage, async () => "# Guide"));
    client = new Client({ name: "memory-test-client", version: "1.0.0" });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    await client.connect(clientTransport);

    close = async () => {
      await client.close();
      await server.close();
    };
  });

  afterEach(async () => {
    await close();
  });

  it("announces itself with the memory instructions", () => {
    expect(client.getServerVersion()).toEqual({ name: SERVER_NAME, version: SERVER_VERSION });
    expect(client.getInstructions()).toBe(SERVER_INSTRUCTIONS);
  });

  it("lists the memory tools", async () => {
    const { tools } = await client.listTools();
    expect(tools).toHaveLength(10);
    expect(tools.find((tool) => tool.name === "get_relationships")?.inputSchema.properties).toHaveProperty("cursor");
  });

  it("runs tool calls against the store", async () => {
    const created = await client.callTool({ name: "create_entities", arguments: { entities: [{ name: "Alice" }] } });
    expect(created.isError).toBe(false);

    const found = await client.callTool({ name: "get_entity", arguments: { name: "Alice" } });
    expect(found.isError).toBe(false);
    expect(found.content).toEqual([{ type: "text", text: expect.stringContaining('"name": "Alice"') }]);
  });

  it("returns protocol errors for unknown tools", async () => {
    await expect(client.callTool({ name: "drop_database", arguments: {} })).rejects.toThrow(/Unknown tool: drop_database/);
  });
});
