// Storage manager: database backend contract and configuration gate
import type { MemoryConfig } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { QueryDocument } from './graph-types.js';
import type { IndexInfo, IndexKeys } from './index-structures.js';
import { silentLogger, type Logger } from './logger.js';
import { toErrorResponse, type ErrorResponse } from './response-utils.js';
import { SchemaBootstrapper } from './schema-bootstrapper.js';

/** Stored document with its identifier converted to a plain string */
export type StoredDocument = { _id: string } & Record<string, unknown>;

export interface FindOptions {
  limit?: number;
  /** Sort by `_id` ascending */
  sortById?: boolean;
  /** Only documents whose `_id` is greater than this one */
  afterId?: string;
}

export interface InsertManyResult {
  insertedCount: number;
  insertedIds: string[];
}

export interface InsertOneResult {
  acknowledged: boolean;
  insertedId: string;
}

export interface UpdateResult {
  matchedCount: number;
  upsertedId: string | null;
}

export interface DeleteResult {
  acknowledged: boolean;
  deletedCount: number;
}

/**
 * Subset of collection operations the stores rely on.
 * Implementations raise DuplicateKeyError for unique index violations and
 * DatabaseError for any other database failure.
 */
export interface DocumentCollection {
  insertMany(documents: QueryDocument[]): Promise<InsertManyResult>;
  insertOne(document: QueryDocument): Promise<InsertOneResult>;
  findOne(filter: QueryDocument): Promise<StoredDocument | null>;
  find(filter: QueryDocument, options?: FindOptions): Promise<StoredDocument[]>;
  countDocuments(filter: QueryDocument): Promise<number>;
  updateOne(filter: QueryDocument, update: QueryDocument, options?: { upsert?: boolean }): Promise<UpdateResult>;
  deleteOne(filter: QueryDocument): Promise<DeleteResult>;
  deleteMany(filter: QueryDocument): Promise<DeleteResult>;
  listIndexes(): Promise<IndexInfo[]>;
  createIndex(key: IndexKeys, options: { name: string; unique: boolean }): Promise<string>;
  /** Distinct values per top-level field, skipping excluded fields and date or object values */
  summarizeFields(excludedFields: string[]): Promise<Array<{ field: string; values: unknown[] }>>;
}

export interface CollectionOptions {
  exists: boolean;
  validator: QueryDocument | null;
}

/** One connected database client */
export interface DocumentDatabase {
  /** Collection of the memory database */
  collection(name: string): DocumentCollection;
  /** Collection of the system database */
  systemCollection(name: string): DocumentCollection;
  ping(): Promise<void>;
  getCollectionOptions(name: string): Promise<CollectionOptions>;
  /** Sets the validator, creating the collection when it does not exist */
  setValidator(name: string, validator: QueryDocument): Promise<void>;
  close(): Promise<void>;
}

export type DatabaseConnector = (config: MemoryConfig & { connectionString: string }) => Promise<DocumentDatabase>;

export interface OpenOptions {
  connect: DatabaseConnector;
  logger?: Logger;
}

/**
 * Owns the database connection and gates every store operation on it.
 *
 * A missing connection string or an unreachable server leaves the manager
 * unconfigured: operations then return the cached configuration error without
 * touching a database. Schema bootstrap failure against a reachable server is
 * thrown from open().
 */
export class StorageManager {
  private constructor(
    readonly config: MemoryConfig,
    private readonly database: DocumentDatabase | null,
    private readonly configurationError: ConfigurationError | null,
    private readonly bootstrapper: SchemaBootstrapper | null,
    private readonly logger: Logger
  ) {}

  static async open(config: MemoryConfig, options: OpenOptions): Promise<StorageManager> {
    const logger = (options.logger ?? silentLogger).child({ component: "storage" });
    const { connectionString } = config;
    if (!connectionString) {
      return StorageManager.unconfigured(
        config,
        new ConfigurationError(
          "No MCP_MONGO_MEMORY_CONNECTION set for MongoDB",
          "Set MCP_MONGO_MEMORY_CONNECTION to a MongoDB connection string and restart the server"
        ),
        logger
      );
    }

    let database: DocumentDatabase;
    try {
      database = await options.connect({ ...config, connectionString });
    } catch (error) {
      return StorageManager.unconfigured(
        config,
        new ConfigurationError(`Can't connect to MongoDB: ${errorMessage(error)}`, "Check that the server is running and reachable"),
        logger
      );
    }

    try {
      await database.ping();
    } catch (error) {
      await database.close();
      return StorageManager.unconfigured(
        config,
        new ConfigurationError(`Can't connect to MongoDB: ${errorMessage(error)}`, "Check that the server is running and reachable"),
        logger
      );
    }

    const bootstrapper = new SchemaBootstrapper(database, logger);
    try {
      await bootstrapper.ensureEntitySchema();
    } catch (error) {
      await database.close();
      throw error;
    }

    logger.info("Connected to MongoDB", { database: config.database });
    return new StorageManager(config, database, null, bootstrapper, logger);
  }

  /** A manager that answers every operation with the given configuration error */
  static unconfigured(config: MemoryConfig, error: ConfigurationError, logger: Logger = silentLogger): StorageManager {
    logger.error("Memory store is not configured", { error: error.message });
    return new StorageManager(config, null, error, null, logger);
  }

  isConfigured(): boolean {
    return this.database !== null;
  }

  /**
   * Runs an operation against the database if the store is configured.
   * Expected failures become error envelopes carrying `fallback` fields;
   * anything else propagates.
   */
  async guard<T extends object>(
    operation: (database: DocumentDatabase, bootstrapper: SchemaBootstrapper) => Promise<T>,
    fallback: Record<string, unknown> = {}
  ): Promise<T | ErrorResponse> {
    if (this.database === null || this.bootstrapper === null) {
      return toErrorResponse(this.configurationError ?? new ConfigurationError("Memory store is not configured"), fallback);
    }
    try {
      return await operation(this.database, this.bootstrapper);
    } catch (error) {
      const response = toErrorResponse(error, fallback);
      this.logger.warn("Memory operation failed", { error: response.error, message: response.message });
      return response;
    }
  }

  async close(): Promise<void> {
    if (this.database !== null) {
      await this.database.close();
      this.logger.info("Closed MongoDB connection");
    }
  }
}
