// Knowledge graph manager: one entry point over the entity and relationship stores
import { readFile } from 'fs/promises';
import { EntityStore } from './entity-store.js';
import type { MemoryStructure } from './graph-types.js';
import { ENTITY_COLLECTION, STRUCTURE_EXCLUDED_FIELDS, SYSTEM_COLLECTION } from './index-structures.js';
import { RelationshipStore } from './relationship-store.js';
import { createSuccessResponse, type MemoryResponse } from './response-utils.js';
import type { StorageManager } from './storage-manager.js';

/** Usage guide shipped beside the package sources */
export const USAGE_GUIDE_URL = new URL("../../../assets/usage-guide.md", import.meta.url);

export const SERVER_INSTRUCTIONS = `This is a MongoDB-based memory database for persistent storage of information.

Before using any memory operations:
1. Call get_usage_guide() to learn the usage patterns and examples
2. Call get_memory_structure() to learn how the current memory is organized

Available operations: create_entities, get_entity, update_entity, delete_entity, find_entities, create_relationship, get_relationships, delete_relationship, get_memory_structure, get_usage_guide.`;

/**
 * Groups the stores that share one storage manager and adds the read-only
 * views of the memory: its structure and the usage guide.
 */
export class KnowledgeGraphManager {
  readonly entities: EntityStore;
  readonly relationships: RelationshipStore;
  private usageGuide: Promise<string> | null = null;

  constructor(
    readonly storage: StorageManager,
    private readonly readGuide: () => Promise<string> = () => readFile(USAGE_GUIDE_URL, "utf-8")
  ) {
    this.entities = new EntityStore(storage);
    this.relationships = new RelationshipStore(storage, this.entities);
  }

  /**
   * Returns the structure record kept in the system database, or, when there
   * is none, a summary of the field values found on stored entities.
   */
  async getMemoryStructure(): Promise<MemoryResponse<MemoryStructure>> {
    return this.storage.guard(async database => {
      const record = await database.systemCollection(SYSTEM_COLLECTION).findOne({ structure: true });
      if (record !== null) {
        const { _id, structure, ...fields } = record;
        return createSuccessResponse<MemoryStructure>({ source: "configured", structure: fields });
      }

      const fields = await database.collection(ENTITY_COLLECTION).summarizeFields(STRUCTURE_EXCLUDED_FIELDS);
      return createSuccessResponse<MemoryStructure>({ source: "derived", structure: { fields } });
    });
  }

  /** Markdown usage guide, read once */
  getUsageGuide(): Promise<string> {
    if (this.usageGuide === null) {
      this.usageGuide = this.readGuide().catch((error: unknown) => {
        this.usageGuide = null;
        throw error;
      });
    }
    return this.usageGuide;
  }

  close(): Promise<void> {
    return this.storage.close();
  }
}
