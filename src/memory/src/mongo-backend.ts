// MongoDB implementation of the storage backend
import {
  MongoBulkWriteError,
  MongoClient,
  MongoError,
  MongoServerError,
  ObjectId,
  type Collection,
  type Db,
  type Document,
  type Filter,
  type WithId,
} from 'mongodb';
import type { MemoryConfig } from './config.js';
import { DatabaseError, DuplicateKeyError, ValidationError } from './errors.js';
import type { IndexInfo, IndexKeys } from './index-structures.js';
import type {
  CollectionOptions,
  DeleteResult,
  DocumentCollection,
  DocumentDatabase,
  FindOptions,
  InsertManyResult,
  InsertOneResult,
  StoredDocument,
  UpdateResult,
} from './storage-manager.js';

const DUPLICATE_KEY_CODE = 11000;
const NAMESPACE_NOT_FOUND_CODE = 26;
const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

/** Maps driver errors onto the store's error taxonomy */
export function translateError(error: unknown): unknown {
  if (error instanceof MongoBulkWriteError && error.code === DUPLICATE_KEY_CODE) {
    return new DuplicateKeyError(error.message, error.insertedCount);
  }
  if (error instanceof MongoServerError && error.code === DUPLICATE_KEY_CODE) {
    return new DuplicateKeyError(error.message);
  }
  if (error instanceof MongoError) {
    return new DatabaseError(error.message);
  }
  return error;
}

async function translated<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error) {
    throw translateError(error);
  }
}

function toStored(document: WithId<Document>): StoredDocument {
  return { ...document, _id: String(document._id) };
}

function toIndexInfo(index: Document): IndexInfo {
  const key: IndexKeys = {};
  for (const [field, direction] of Object.entries(index.key ?? {})) {
    key[field] = direction === -1 ? -1 : 1;
  }
  return { name: String(index.name), key, unique: index.unique === true };
}

class MongoDocumentCollection implements DocumentCollection {
  constructor(private readonly collection: Collection<Document>) {}

  insertMany(documents: Document[]): Promise<InsertManyResult> {
    return translated(async () => {
      const result = await this.collection.insertMany(documents, { ordered: true });
      return { insertedCount: result.insertedCount, insertedIds: Object.values(result.insertedIds).map(String) };
    });
  }

  insertOne(document: Document): Promise<InsertOneResult> {
    return translated(async () => {
      const result = await this.collection.insertOne(document);
      return { acknowledged: result.acknowledged, insertedId: String(result.insertedId) };
    });
  }

  findOne(filter: Document): Promise<StoredDocument | null> {
    return translated(async () => {
      const document = await this.collection.findOne(filter);
      return document === null ? null : toStored(document);
    });
  }

  find(filter: Document, options: FindOptions = {}): Promise<StoredDocument[]> {
    return translated(async () => {
      let query: Filter<Document> = filter;
      if (options.afterId !== undefined) {
        if (!OBJECT_ID_PATTERN.test(options.afterId)) {
          throw new ValidationError(`Invalid cursor: "${options.afterId}"`, "Pass the next_cursor of a previous page");
        }
        query = { $and: [filter, { _id: { $gt: new ObjectId(options.afterId) } }] };
      }
      let cursor = this.collection.find(query);
      if (options.sortById) {
        cursor = cursor.sort({ _id: 1 });
      }
      if (options.limit !== undefined) {
        cursor = cursor.limit(options.limit);
      }
      const documents = await cursor.toArray();
      return documents.map(toStored);
    });
  }

  countDocuments(filter: Document): Promise<number> {
    return translated(() => this.collection.countDocuments(filter));
  }

  updateOne(filter: Document, update: Document, options: { upsert?: boolean } = {}): Promise<UpdateResult> {
    return translated(async () => {
      const result = await this.collection.updateOne(filter, update, { upsert: options.upsert ?? false });
      return {
        matchedCount: result.matchedCount,
        upsertedId: result.upsertedId === null ? null : String(result.upsertedId),
      };
    });
  }

  deleteOne(filter: Document): Promise<DeleteResult> {
    return translated(async () => {
      const result = await this.collection.deleteOne(filter);
      return { acknowledged: result.acknowledged, deletedCount: result.deletedCount };
    });
  }

  deleteMany(filter: Document): Promise<DeleteResult> {
    return translated(async () => {
      const result = await this.collection.deleteMany(filter);
      return { acknowledged: result.acknowledged, deletedCount: result.deletedCount };
    });
  }

  listIndexes(): Promise<IndexInfo[]> {
    return translated(async () => {
      try {
        const indexes = await this.collection.listIndexes().toArray();
        return indexes.map(toIndexInfo);
      } catch (error) {
        if (error instanceof MongoServerError && error.code === NAMESPACE_NOT_FOUND_CODE) {
          return [];
        }
        throw error;
      }
    });
  }

  createIndex(key: IndexKeys, options: { name: string; unique: boolean }): Promise<string> {
    return translated(() => this.collection.createIndex(key, options));
  }

  summarizeFields(excludedFields: string[]): Promise<Array<{ field: string; values: unknown[] }>> {
    return translated(async () => {
      const groups = await this.collection
        .aggregate([
          { $project: { fields: { $objectToArray: "$$ROOT" } } },
          { $unwind: "$fields" },
          { $addFields: { field_type: { $type: "$fields.v" } } },
          { $match: { "fields.k": { $nin: excludedFields }, field_type: { $nin: ["date", "object"] } } },
          { $group: { _id: "$fields.k", values: { $addToSet: "$fields.v" } } },
          { $sort: { _id: 1 } },
        ])
        .toArray();
      return groups.map(group => ({
        field: String(group._id),
        values: Array.isArray(group.values) ? group.values : [],
      }));
    });
  }
}

class MongoDocumentDatabase implements DocumentDatabase {
  private readonly db: Db;
  private readonly systemDb: Db;

  constructor(private readonly client: MongoClient, config: MemoryConfig) {
    this.db = client.db(config.database);
    this.systemDb = client.db(config.systemDatabase);
  }

  collection(name: string): DocumentCollection {
    return new MongoDocumentCollection(this.db.collection(name));
  }

  systemCollection(name: string): DocumentCollection {
    return new MongoDocumentCollection(this.systemDb.collection(name));
  }

  ping(): Promise<void> {
    return translated(async () => {
      await this.client.db("admin").command({ ping: 1 });
    });
  }

  getCollectionOptions(name: string): Promise<CollectionOptions> {
    return translated(async () => {
      const [info] = await this.db.listCollections({ name }).toArray();
      if (info === undefined) {
        return { exists: false, validator: null };
      }
      const validator: unknown = "options" in info ? info.options?.validator : undefined;
      return {
        exists: true,
        validator: typeof validator === "object" && validator !== null ? { ...validator } : null,
      };
    });
  }

  setValidator(name: string, validator: Document): Promise<void> {
    return translated(async () => {
      const { exists } = await this.getCollectionOptions(name);
      if (exists) {
        await this.db.command({ collMod: name, validator });
      } else {
        await this.db.createCollection(name, { validator });
      }
    });
  }

  close(): Promise<void> {
    return this.client.close();
  }
}

/** Connects a MongoClient; the server selection timeout bounds both connect and ping */
export async function connectMongo(config: MemoryConfig & { connectionString: string }): Promise<DocumentDatabase> {
  const client = new MongoClient(config.connectionString, {
    serverSelectionTimeoutMS: config.timeoutMs,
    appName: "mcp-mongo-memory",
  });
  await client.connect();
  return new MongoDocumentDatabase(client, config);
}
