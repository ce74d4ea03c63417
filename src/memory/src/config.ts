// Configuration loaded from environment variables
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

/** Memory store configuration */
export const MemoryConfigSchema = z.object({
  /** MongoDB connection string; its absence leaves the store unconfigured */
  connectionString: optionalString,
  database: z.string().min(1).default("agent_memory"),
  systemDatabase: z.string().min(1).default("memory"),
  timeoutMs: z.coerce.number().int().positive().default(5000),
  onEntityDelete: z.enum(["keep", "cascade", "reject"]).default("keep"),
  logLevel: z.enum(LOG_LEVELS).default("info"),
});

export type MemoryConfig = z.infer<typeof MemoryConfigSchema>;

export const ENV_VARS = {
  connectionString: "MCP_MONGO_MEMORY_CONNECTION",
  database: "MCP_MONGO_MEMORY_DATABASE",
  systemDatabase: "MCP_MONGO_MEMORY_SYSTEM_DATABASE",
  timeoutMs: "MCP_MONGO_MEMORY_TIMEOUT_MS",
  onEntityDelete: "MCP_MONGO_MEMORY_ON_ENTITY_DELETE",
  logLevel: "LOG_LEVEL",
} as const satisfies Record<keyof MemoryConfig, string>;

/** Builds a config from defaults and the given overrides */
export function createConfig(overrides: Partial<z.input<typeof MemoryConfigSchema>> = {}): MemoryConfig {
  return MemoryConfigSchema.parse(overrides);
}

/**
 * Reads the configuration from environment variables.
 * Empty variables count as unset. Throws ConfigurationError on invalid values.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MemoryConfig {
  const raw: Record<string, string> = {};
  for (const [key, variable] of Object.entries(ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined && value.trim() !== "") {
      raw[key] = value.trim();
    }
  }

  const parsed = MemoryConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const variable = Object.entries(ENV_VARS).find(([key]) => key === issue.path[0]);
      return `${variable ? variable[1] : issue.path.join(".")}: ${issue.message}`;
    });
    throw new ConfigurationError(
      `Invalid memory configuration: ${problems.join("; ")}`,
      "Check the MCP_MONGO_MEMORY_* environment variables"
    );
  }
  return parsed.data;
}
