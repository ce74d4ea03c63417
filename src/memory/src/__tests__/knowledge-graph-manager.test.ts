import { describe, expect, it, vi } from 'vitest';
import { KnowledgeGraphManager } from '../knowledge-graph-manager.js';
import { openTestStorage } from './helpers/test-storage.js';

describe("KnowledgeGraphManager", () => {
  describe("getMemoryStructure", () => {
    it("returns the configured structure record without its marker fields", async () => {
      const { storage, database } = await openTestStorage();
      await database.systemCollection("sys").insertOne({
        structure: true,
        entity_types: ["person", "company"],
        relationship_types: ["works_at", "knows"],
      });

      expect(await new KnowledgeGraphManager(storage).getMemoryStructure()).toEqual({
        success: true,
        source: "configured",
        structure: {
          entity_types: ["person", "company"],
          relationship_types: ["works_at", "knows"],
        },
      });
    });

    it("derives the structure from stored entities when none is configured", async () => {
      const { storage } = await openTestStorage();
      const manager = new KnowledgeGraphManager(storage);
      await manager.entities.createEntities([
        { name: "Alice", type: "person", description: "Backend engineer", data: { team: "core" } },
        { name: "Acme", type: "company", tags: ["customer"] },
        { name: "Bob", type: "person" },
      ]);

      expect(await manager.getMemoryStructure()).toEqual({
        success: true,
        source: "derived",
        structure: {
          fields: [
            { field: "tags", values: [["customer"]] },
            { field: "type", values: ["person", "company"] },
          ],
        },
      });
    });
  });

  describe("getUsageGuide", () => {
    it("reads the guide once", async () => {
      const { storage } = await openTestStorage();
      const readGuide = vi.fn(async () => "# Guide");
      const manager = new KnowledgeGraphManager(storage, readGuide);

      expect(await manager.getUsageGuide()).toBe("# Guide");
      expect(await manager.getUsageGuide()).toBe("# Guide");
      expect(readGuide).toHaveBeenCalledTimes(1);
    });

    it("reads again after a failed read", async () => {
      const { storage } = await openTestStorage();
      const readGuide = vi
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new Error("EACCES: permission denied"))
        .mockResolvedValue("# Guide");
      const manager = new KnowledgeGraphManager(storage, readGuide);

      await expect(manager.getUsageGuide()).rejects.toThrow("EACCES: permission denied");
      expect(await manager.getUsageGuide()).toBe("# Guide");
      expect(readGuide).toHaveBeenCalledTimes(2);
    });

    it("ships a guide with the package", async () => {
      const { storage } = await openTestStorage();
      const guide = await new KnowledgeGraphManager(storage).getUsageGuide();

      expect(guide.split("\n")[0]).toBe("# MongoDB Memory Quick Start");
    });
  });

  it("closes the storage on close", async () => {
    const { storage, database } = await openTestStorage();
    await new KnowledgeGraphManager(storage).close();
    expect(database.closed).toBe(true);
  });
});
