import { describe, expect, it } from 'vitest';
import { DatabaseError } from '../errors.js';
import { ENTITY_VALIDATOR } from '../index-structures.js';
import { silentLogger } from '../logger.js';
import { SchemaBootstrapper } from '../schema-bootstrapper.js';
import { InMemoryDatabase } from './helpers/in-memory-database.js';

const RELATIONSHIP_INDEX_NAMES = ["from_entity_1", "to_entity_1", "type_1", "from_entity_to_entity_type_unique"];

describe("SchemaBootstrapper", () => {
  it("creates the entity validator and unique name index", async () => {
    const database = new InMemoryDatabase();
    await new SchemaBootstrapper(database, silentLogger).ensureEntitySchema();

    const entities = database.collection("entities");
    expect(entities.validator).toEqual(ENTITY_VALIDATOR);
    expect(await entities.listIndexes()).toEqual([
      { name: "_id_", key: { _id: 1 } },
      { name: "name_unique", key: { name: 1 }, unique: true },
    ]);
  });

  it("changes nothing when rerun against a prepared database", async () => {
    const database = new InMemoryDatabase();
    const bootstrapper = new SchemaBootstrapper(database, silentLogger);
    await bootstrapper.ensureEntitySchema();
    database.calls.length = 0;

    await new SchemaBootstrapper(database, silentLogger).ensureEntitySchema();

    expect(database.calls).toEqual(["entities.getCollectionOptions", "entities.listIndexes"]);
  });

  it("keeps an existing validator", async () => {
    const database = new InMemoryDatabase();
    const custom = { $jsonSchema: { bsonType: "object", required: ["name", "type"] } };
    await database.setValidator("entities", custom);

    await new SchemaBootstrapper(database, silentLogger).ensureEntitySchema();

    expect(database.collection("entities").validator).toEqual(custom);
  });

  it("recognizes an equivalent unique index under another name", async () => {
    const database = new InMemoryDatabase();
    await database.collection("entities").createIndex({ name: 1 }, { name: "by_name", unique: true });

    await new SchemaBootstrapper(database, silentLogger).ensureEntitySchema();

    expect(database.collection("entities").indexes.map((index) => index.name)).toEqual(["by_name"]);
  });

  it("fails when a non-unique index already covers the name field", async () => {
    const database = new InMemoryDatabase();
    await database.collection("entities").createIndex({ name: 1 }, { name: "by_name", unique: false });

    await expect(new SchemaBootstrapper(database, silentLogger).ensureEntitySchema()).rejects.toThrow(DatabaseError);
    expect(database.collection("entities").indexes).toEqual([{ name: "by_name", key: { name: 1 }, unique: false }]);
  });

  it("creates relationship indexes once for concurrent callers", async () => {
    const database = new InMemoryDatabase();
    const bootstrapper = new SchemaBootstrapper(database, silentLogger);

    await Promise.all([bootstrapper.ensureRelationshipIndexes(), bootstrapper.ensureRelationshipIndexes()]);
    await bootstrapper.ensureRelationshipIndexes();

    expect(database.calls.filter((call) => call === "relationships.listIndexes")).toHaveLength(1);
    expect(database.collection("relationships").indexes).toEqual([
      { name: "from_entity_1", key: { from_entity: 1 }, unique: false },
      { name: "to_entity_1", key: { to_entity: 1 }, unique: false },
      { name: "type_1", key: { type: 1 }, unique: false },
      {
        name: "from_entity_to_entity_type_unique",
        key: { from_entity: 1, to_entity: 1, type: 1 },
        unique: true,
      },
    ]);
  });

  it("retries relationship indexes after a failed attempt", async () => {
    const database = new InMemoryDatabase();
    const bootstrapper = new SchemaBootstrapper(database, silentLogger);
    database.failOnce("relationships.listIndexes", new DatabaseError("index build interrupted"));

    await expect(bootstrapper.ensureRelationshipIndexes()).rejects.toThrow("index build interrupted");
    expect(database.collection("relationships").indexes).toEqual([]);

    await bootstrapper.ensureRelationshipIndexes();
    expect(database.collection("relationships").indexes.map((index) => index.name)).toEqual(RELATIONSHIP_INDEX_NAMES);
  });
});
