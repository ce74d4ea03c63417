// Relationship operations over the relationships collection
import { isPlainObject, type EntityStore } from './entity-store.js';
import { DuplicateKeyError, MissingReferenceError, ValidationError } from './errors.js';
import type {
  QueryDocument,
  Relationship,
  RelationshipPage,
  RelationshipQuery,
} from './graph-types.js';
import { RELATIONSHIP_COLLECTION } from './index-structures.js';
import { parseRelationshipDescriptor } from './relationship-descriptor.js';
import {
  createErrorResponse,
  createSuccessResponse,
  type MemoryResponse,
} from './response-utils.js';
import type { DocumentDatabase, StorageManager, StoredDocument } from './storage-manager.js';

export const MIN_PAGE_SIZE = 1;
export const MAX_PAGE_SIZE = 100;

function emptyPage() {
  return {
    relationships: [],
    total_count: 0,
    page_info: { has_next: false, next_cursor: null },
  };
}

function toProperties(value: unknown): Record<string, string> {
  const properties: Record<string, string> = {};
  if (isPlainObject(value)) {
    for (const [key, property] of Object.entries(value)) {
      properties[key] = String(property);
    }
  }
  return properties;
}

/** Key-sorted copy, so exact property matches do not depend on the order keys were written in */
function sortedProperties(properties: Record<string, string>): Record<string, string> {
  const sorted: Record<string, string> = {};
  for (const key of Object.keys(properties).sort()) {
    sorted[key] = properties[key];
  }
  return sorted;
}

function toRelationship(document: StoredDocument): Relationship {
  return {
    ...document,
    from_entity: String(document.from_entity),
    to_entity: String(document.to_entity),
    type: String(document.type),
    properties: toProperties(document.properties),
    created_at: document.created_at instanceof Date ? document.created_at : new Date(String(document.created_at)),
  };
}

/**
 * Relationship create, paged query and delete.
 * Endpoints are checked through the entity store; a missing endpoint is
 * reported as a "Missing reference" envelope.
 */
export class RelationshipStore {
  constructor(
    private readonly storage: StorageManager,
    private readonly entities: EntityStore
  ) {}

  /**
   * Creates one relationship. Properties parsed from the descriptor override
   * separately supplied ones with the same key.
   */
  async createRelationship(
    fromEntity: string,
    toEntity: string,
    descriptor: string,
    properties: Record<string, string> = {}
  ): Promise<MemoryResponse<{ acknowledged: boolean; inserted_id: string }>> {
    return this.storage.guard(async (database, bootstrapper) => {
      await this.requireEndpoints(database, fromEntity, toEntity);
      const parsed = parseRelationshipDescriptor(descriptor);

      await bootstrapper.ensureRelationshipIndexes();

      try {
        const result = await database.collection(RELATIONSHIP_COLLECTION).insertOne({
          from_entity: fromEntity,
          to_entity: toEntity,
          type: parsed.type,
          properties: sortedProperties({ ...properties, ...parsed.properties }),
          created_at: new Date(),
        });
        return createSuccessResponse({ acknowledged: result.acknowledged, inserted_id: result.insertedId });
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          return createErrorResponse(
            error.category,
            `Relationship "${parsed.type}" from "${fromEntity}" to "${toEntity}" already exists`,
            "Only one relationship of a type may link the same two entities. Delete it first to change its properties."
          );
        }
        throw error;
      }
    });
  }

  /**
   * Returns one page of relationships ordered by `_id`. `total_count` covers
   * every match of `query`, independent of `limit` and `cursor`.
   */
  async getRelationships({ query, limit = 10, cursor }: RelationshipQuery = {}): Promise<MemoryResponse<RelationshipPage>> {
    return this.storage.guard(async database => {
      if (!Number.isInteger(limit) || limit < MIN_PAGE_SIZE || limit > MAX_PAGE_SIZE) {
        throw new ValidationError(`Limit must be between ${MIN_PAGE_SIZE} and ${MAX_PAGE_SIZE}, got ${limit}`);
      }
      let filter: QueryDocument = {};
      if (query !== undefined) {
        if (!isPlainObject(query)) {
          throw new ValidationError("Query must be an object", 'Example: {"type": "imports"}');
        }
        filter = query;
      }
      if (cursor !== undefined && (typeof cursor !== "string" || cursor === "")) {
        throw new ValidationError("Cursor must be a non-empty string");
      }

      const collection = database.collection(RELATIONSHIP_COLLECTION);
      const totalCount = await collection.countDocuments(filter);
      const documents = await collection.find(filter, { limit: limit + 1, sortById: true, afterId: cursor });

      const hasNext = documents.length > limit;
      const relationships = documents.slice(0, limit).map(toRelationship);
      const last = relationships[relationships.length - 1];

      return createSuccessResponse({
        relationships,
        total_count: totalCount,
        page_info: {
          has_next: hasNext,
          next_cursor: hasNext && last !== undefined ? last._id : null,
        },
      });
    }, emptyPage());
  }

  /**
   * Deletes at most one relationship of the descriptor's type between the two
   * entities whose stored property map equals the descriptor's exactly; a bare
   * type only matches a relationship without properties. Deleting nothing is
   * not an error. The success envelope carries `error: null`.
   */
  async deleteRelationship(
    fromEntity: string,
    toEntity: string,
    descriptor: string
  ): Promise<MemoryResponse<{ acknowledged: boolean; deleted_count: number; error: null }>> {
    return this.storage.guard(async database => {
      await this.requireEndpoints(database, fromEntity, toEntity);
      const { type, properties } = parseRelationshipDescriptor(descriptor);

      const result = await database.collection(RELATIONSHIP_COLLECTION).deleteOne({
        from_entity: fromEntity,
        to_entity: toEntity,
        type,
        properties: sortedProperties(properties),
      });
      return createSuccessResponse({ acknowledged: result.acknowledged, deleted_count: result.deletedCount, error: null });
    }, { acknowledged: false, deleted_count: 0 });
  }

  private async requireEndpoints(database: DocumentDatabase, fromEntity: string, toEntity: string): Promise<void> {
    if (!(await this.entities.entityExists(database, fromEntity))) {
      throw new MissingReferenceError(
        `Source entity '${fromEntity}' does not exist`,
        "Create it with create_entities first"
      );
    }
    if (!(await this.entities.entityExists(database, toEntity))) {
      throw new MissingReferenceError(
        `Target entity '${toEntity}' does not exist`,
        "Create it with create_entities first"
      );
    }
  }
}
