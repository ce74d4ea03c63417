// Entity CRUD over the entities collection
import {
  DuplicateKeyError,
  NotFoundError,
  ReferencedEntityError,
  ValidationError,
} from './errors.js';
import type { Entity, EntityDeletePolicy, EntityInput, QueryDocument } from './graph-types.js';
import { ENTITY_COLLECTION, ENTITY_NAME_FIELD, RELATIONSHIP_COLLECTION } from './index-structures.js';
import {
  createErrorResponse,
  createSuccessResponse,
  type MemoryResponse,
} from './response-utils.js';
import type { DocumentDatabase, StorageManager, StoredDocument } from './storage-manager.js';

/** Fields the store manages itself and drops from create input */
const MANAGED_FIELDS = new Set(["_id", "created_at", "updated_at"]);

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

function toEntity(document: StoredDocument): Entity {
  const { _id, name, created_at, updated_at, ...fields } = document;
  return {
    ...fields,
    _id,
    name: String(name),
    created_at: created_at instanceof Date ? created_at : new Date(String(created_at)),
    updated_at: updated_at instanceof Date ? updated_at : new Date(String(updated_at)),
  };
}

function validateEntity(entity: unknown, position: number): EntityInput {
  if (!isPlainObject(entity)) {
    throw new ValidationError(`Entity at position ${position} must be an object`);
  }
  const name = entity[ENTITY_NAME_FIELD];
  if (name === undefined) {
    throw new ValidationError(`Missing required field: ${ENTITY_NAME_FIELD} (entity at position ${position})`);
  }
  if (typeof name !== "string" || name.trim() === "") {
    throw new ValidationError(`Field ${ENTITY_NAME_FIELD} must be a non-empty string (entity at position ${position})`);
  }
  return { ...entity, name };
}

function mentionsField(update: QueryDocument, field: string): boolean {
  return Object.values(update).some(fields => isPlainObject(fields) && field in fields);
}

export interface EntityStoreOptions {
  onEntityDelete?: EntityDeletePolicy;
}

/**
 * Entity operations. Every method goes through the storage gate and reports
 * expected failures as error envelopes.
 */
export class EntityStore {
  private readonly onEntityDelete: EntityDeletePolicy;

  constructor(private readonly storage: StorageManager, options: EntityStoreOptions = {}) {
    this.onEntityDelete = options.onEntityDelete ?? storage.config.onEntityDelete;
  }

  /**
   * Inserts all entities as one ordered batch after validating every one.
   * A duplicate name stops the batch; documents written before it stay and are
   * counted in the error envelope.
   */
  async createEntities(entities: unknown[]): Promise<MemoryResponse<{ created: number }>> {
    return this.storage.guard(async database => {
      if (!Array.isArray(entities) || entities.length === 0) {
        throw new ValidationError("entities must be a non-empty list");
      }
      const validated = entities.map(validateEntity);

      const now = new Date();
      const documents = validated.map(entity => {
        const document: QueryDocument = {};
        for (const [field, value] of Object.entries(entity)) {
          if (!MANAGED_FIELDS.has(field)) {
            document[field] = value;
          }
        }
        return { ...document, created_at: now, updated_at: now };
      });

      try {
        const result = await database.collection(ENTITY_COLLECTION).insertMany(documents);
        return createSuccessResponse({ created: result.insertedCount });
      } catch (error) {
        if (error instanceof DuplicateKeyError) {
          return createErrorResponse(
            error.category,
            `Duplicate key error: ${error.message}`,
            "Entity names must be unique. Use update_entity to change an existing entity or choose another name.",
            { created: error.insertedCount }
          );
        }
        throw error;
      }
    });
  }

  async getEntity(name: string): Promise<MemoryResponse<{ entity: Entity }>> {
    return this.storage.guard(async database => {
      const document = await database.collection(ENTITY_COLLECTION).findOne({ [ENTITY_NAME_FIELD]: name });
      if (document === null) {
        throw new NotFoundError(`Entity "${name}" not found`, "Use find_entities to look up entities by other fields");
      }
      return createSuccessResponse({ entity: toEntity(document) });
    });
  }

  /**
   * Applies a native update document to the entity named `name`.
   * `$set.updated_at` and, on upsert, `$setOnInsert.created_at` are stamped
   * unless some operator of the update already writes that field.
   */
  async updateEntity(
    name: string,
    update: QueryDocument,
    upsert = false
  ): Promise<MemoryResponse<{ upserted?: boolean }>> {
    return this.storage.guard(async database => {
      if (!isPlainObject(update) || Object.keys(update).length === 0) {
        throw new ValidationError("update must be a non-empty update document", 'Example: {"$set": {"data.status": "done"}}');
      }
      const plainKeys = Object.keys(update).filter(key => !key.startsWith("$"));
      if (plainKeys.length > 0) {
        throw new ValidationError(
          `update must only contain update operators, got: ${plainKeys.join(", ")}`,
          'Wrap field changes in an operator such as {"$set": {...}}'
        );
      }
      const set = update.$set ?? {};
      if (!isPlainObject(set)) {
        throw new ValidationError("$set must be an object");
      }

      const now = new Date();
      const document: QueryDocument = { ...update };
      if (!mentionsField(update, "updated_at")) {
        document.$set = { updated_at: now, ...set };
      }
      if (upsert && !mentionsField(update, "created_at")) {
        const setOnInsert = update.$setOnInsert ?? {};
        if (!isPlainObject(setOnInsert)) {
          throw new ValidationError("$setOnInsert must be an object");
        }
        document.$setOnInsert = { created_at: now, ...setOnInsert };
      }

      const result = await database
        .collection(ENTITY_COLLECTION)
        .updateOne({ [ENTITY_NAME_FIELD]: name }, document, { upsert });

      if (result.matchedCount > 0) {
        return createSuccessResponse({});
      }
      if (upsert && result.upsertedId !== null) {
        return createSuccessResponse({ upserted: true });
      }
      throw new NotFoundError(`Entity "${name}" not found`, "Pass upsert=true to create it");
    });
  }

  async deleteEntity(name: string): Promise<MemoryResponse<{ deleted_relationships?: number }>> {
    return this.storage.guard(async database => {
      const references = { $or: [{ from_entity: name }, { to_entity: name }] };
      const relationships = database.collection(RELATIONSHIP_COLLECTION);

      if (this.onEntityDelete === "reject") {
        const referencing = await relationships.countDocuments(references);
        if (referencing > 0) {
          throw new ReferencedEntityError(
            `Entity "${name}" is referenced by ${referencing} relationship(s)`,
            "Delete its relationships with delete_relationship first"
          );
        }
      }

      const result = await database.collection(ENTITY_COLLECTION).deleteOne({ [ENTITY_NAME_FIELD]: name });
      if (result.deletedCount === 0) {
        throw new NotFoundError(`Entity "${name}" not found`);
      }

      if (this.onEntityDelete === "cascade") {
        const cascade = await relationships.deleteMany(references);
        return createSuccessResponse({ deleted_relationships: cascade.deletedCount });
      }
      return createSuccessResponse({});
    });
  }

  /**
   * Returns up to `limit` entities matching a native filter, in the
   * database's natural order.
   */
  async findEntities(query: unknown, limit = 10): Promise<MemoryResponse<{ entities: Entity[]; count: number }>> {
    return this.storage.guard(async database => {
      if (!isPlainObject(query)) {
        throw new ValidationError("Query must be an object", 'Example: {"type": "person"}');
      }
      if (Object.keys(query).length === 0) {
        throw new ValidationError("Query cannot be empty", 'Example: {"type": "person"}');
      }
      if (!Number.isInteger(limit) || limit < 1) {
        throw new ValidationError(`Limit must be a positive integer, got ${limit}`);
      }

      const documents = await database.collection(ENTITY_COLLECTION).find(query, { limit });
      const entities = documents.map(toEntity);
      return createSuccessResponse({ entities, count: entities.length });
    });
  }

  /** Existence check used for relationship endpoints; runs inside a guarded operation */
  async entityExists(database: DocumentDatabase, name: string): Promise<boolean> {
    const document = await database.collection(ENTITY_COLLECTION).findOne({ [ENTITY_NAME_FIELD]: name });
    return document !== null;
  }
}
