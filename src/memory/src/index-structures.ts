// Collection layout, index and validator definitions for the memory database

export const ENTITY_COLLECTION = "entities";
export const RELATIONSHIP_COLLECTION = "relationships";
export const SYSTEM_COLLECTION = "sys";

/** Identity field of an entity */
export const ENTITY_NAME_FIELD = "name";
/** Fields left out of a derived memory structure */
export const STRUCTURE_EXCLUDED_FIELDS = ["_id", ENTITY_NAME_FIELD, "description"];

export type IndexKeys = Record<string, 1 | -1>;

/** Index as described by the database */
export interface IndexInfo {
  name: string;
  key: IndexKeys;
  unique?: boolean;
}

export interface IndexDefinition {
  name: string;
  key: IndexKeys;
  unique: boolean;
}

export const ENTITY_NAME_INDEX: IndexDefinition = {
  name: "name_unique",
  key: { [ENTITY_NAME_FIELD]: 1 },
  unique: true,
};

export const RELATIONSHIP_INDEXES: readonly IndexDefinition[] = [
  { name: "from_entity_1", key: { from_entity: 1 }, unique: false },
  { name: "to_entity_1", key: { to_entity: 1 }, unique: false },
  { name: "type_1", key: { type: 1 }, unique: false },
  {
    name: "from_entity_to_entity_type_unique",
    key: { from_entity: 1, to_entity: 1, type: 1 },
    unique: true,
  },
];

export const ENTITY_VALIDATOR = {
  $jsonSchema: {
    bsonType: "object",
    required: [ENTITY_NAME_FIELD],
    properties: {
      [ENTITY_NAME_FIELD]: {
        bsonType: "string",
        description: "Unique name of the entity - required field",
      },
    },
  },
};

/**
 * An index satisfies a definition when it covers the same fields in the same
 * order and, for unique definitions, is unique too. Names are not compared so
 * indexes created by hand are recognized.
 */
export function indexSatisfies(index: IndexInfo, definition: IndexDefinition): boolean {
  const actual = Object.entries(index.key);
  const expected = Object.entries(definition.key);
  if (actual.length !== expected.length) {
    return false;
  }
  const sameKeys = expected.every(([field, direction], i) => {
    const [actualField, actualDirection] = actual[i];
    return actualField === field && actualDirection === direction;
  });
  return sameKeys && (!definition.unique || index.unique === true);
}
