// Core graph data types for the MongoDB memory server

/** Native filter or update document passed through to the database */
export type QueryDocument = Record<string, unknown>;

/** Entity as supplied by callers; any further top-level fields are kept */
export interface EntityInput {
  name: string;
  type?: string;
  data?: Record<string, unknown>;
  [field: string]: unknown;
}

/** Entity as stored in the entities collection */
export interface Entity extends EntityInput {
  _id: string;
  created_at: Date;
  updated_at: Date;
}

/** Directed, typed edge between two entities, referenced by name */
export interface Relationship {
  _id: string;
  from_entity: string;
  to_entity: string;
  type: string;
  properties: Record<string, string>;
  created_at: Date;
}

export interface PageInfo {
  has_next: boolean;
  next_cursor: string | null;
}

export interface RelationshipPage {
  relationships: Relationship[];
  total_count: number;
  page_info: PageInfo;
}

export interface RelationshipQuery {
  /** Native filter document; checked when the query runs */
  query?: unknown;
  limit?: number;
  /** `_id` of the last relationship of the previous page */
  cursor?: string;
}

/** What happens to relationships when one of their entities is deleted */
export type EntityDeletePolicy = "keep" | "cascade" | "reject";

/** Distinct values observed for one top-level entity field */
export interface FieldSummary {
  field: string;
  values: unknown[];
}

export type MemoryStructure =
  | { source: "configured"; structure: Record<string, unknown> }
  | { source: "derived"; structure: { fields: FieldSummary[] } };
