// Idempotent creation of the indexes and validators the stores rely on
import {
  ENTITY_COLLECTION,
  ENTITY_NAME_INDEX,
  ENTITY_VALIDATOR,
  RELATIONSHIP_COLLECTION,
  RELATIONSHIP_INDEXES,
  indexSatisfies,
  type IndexDefinition,
} from './index-structures.js';
import type { Logger } from './logger.js';
import type { DocumentCollection, DocumentDatabase } from './storage-manager.js';

/**
 * Applies each schema rule only when the database does not already have it,
 * so bootstrapping is safe to rerun against an existing memory database.
 */
export class SchemaBootstrapper {
  private relationshipIndexes: Promise<void> | null = null;

  constructor(
    private readonly database: DocumentDatabase,
    private readonly logger: Logger
  ) {}

  /**
   * Unique index and required-name validator on the entity collection.
   * Runs once when the store opens.
   */
  async ensureEntitySchema(): Promise<void> {
    const options = await this.database.getCollectionOptions(ENTITY_COLLECTION);
    if (!options.exists || options.validator === null || Object.keys(options.validator).length === 0) {
      await this.database.setValidator(ENTITY_COLLECTION, ENTITY_VALIDATOR);
      this.logger.info("Applied entity validator", { collection: ENTITY_COLLECTION });
    }

    await this.ensureIndexes(this.database.collection(ENTITY_COLLECTION), [ENTITY_NAME_INDEX]);
  }

  /**
   * Indexes of the relationship collection, created on the first relationship
   * write. Concurrent callers share one run; a failed run is retried by the
   * next caller.
   */
  ensureRelationshipIndexes(): Promise<void> {
    if (this.relationshipIndexes === null) {
      this.relationshipIndexes = this.ensureIndexes(
        this.database.collection(RELATIONSHIP_COLLECTION),
        RELATIONSHIP_INDEXES
      ).catch((error: unknown) => {
        this.relationshipIndexes = null;
        throw error;
      });
    }
    return this.relationshipIndexes;
  }

  private async ensureIndexes(collection: DocumentCollection, definitions: readonly IndexDefinition[]): Promise<void> {
    const existing = await collection.listIndexes();
    for (const definition of definitions) {
      if (existing.some(index => indexSatisfies(index, definition))) {
        continue;
      }
      await collection.createIndex(definition.key, { name: definition.name, unique: definition.unique });
      this.logger.info("Created index", { index: definition.name });
    }
  }
}
