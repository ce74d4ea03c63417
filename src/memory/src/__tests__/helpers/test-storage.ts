import { createConfig, type MemoryConfig } from '../../config.js';
import { StorageManager } from '../../storage-manager.js';
import { InMemoryDatabase } from './in-memory-database.js';

export const TEST_CONNECTION = "mongodb://memory.test:27017";

/** Opens a configured storage manager over a fresh in-memory database */
export async function openTestStorage(
  overrides: Partial<MemoryConfig> = {},
  database = new InMemoryDatabase()
): Promise<{ storage: StorageManager; database: InMemoryDatabase }> {
  const config = createConfig({ connectionString: TEST_CONNECTION, ...overrides });
  const storage = await StorageManager.open(config, { connect: async () => database });
  database.calls.length = 0;
  return { storage, database };
}
