// Error taxonomy for memory store operations

export type MemoryErrorKind =
  | "configuration"
  | "validation"
  | "not_found"
  | "duplicate_key"
  | "missing_reference"
  | "format"
  | "referenced"
  | "database";

/**
 * Base class for every expected failure of a store operation.
 * `category` becomes the `error` field of the response envelope and
 * `details` its remediation hint.
 */
export abstract class MemoryError extends Error {
  abstract readonly kind: MemoryErrorKind;
  abstract readonly category: string;
  readonly details?: string;

  constructor(message: string, details?: string) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }
}

/** Missing or invalid connection settings, or database unreachable at start-up */
export class ConfigurationError extends MemoryError {
  readonly kind = "configuration";
  readonly category = "Configuration error";
}

/** Malformed caller-supplied argument */
export class ValidationError extends MemoryError {
  readonly kind = "validation";
  readonly category = "Validation error";
}

export class NotFoundError extends MemoryError {
  readonly kind = "not_found";
  readonly category = "Not found";
}

/** Unique index rejected an insert or upsert */
export class DuplicateKeyError extends MemoryError {
  readonly kind = "duplicate_key";
  readonly category = "Duplicate key error";
  /** Documents of an ordered batch written before the collision */
  readonly insertedCount: number;

  constructor(message: string, insertedCount = 0, details?: string) {
    super(message, details);
    this.insertedCount = insertedCount;
  }
}

/** A relationship names an entity that does not exist */
export class MissingReferenceError extends MemoryError {
  readonly kind = "missing_reference";
  readonly category = "Missing reference";
}

/** Relationship descriptor does not follow `type:key=value,...` */
export class FormatError extends MemoryError {
  readonly kind = "format";
  readonly category = "Invalid relationship_type format";
}

/** Entity deletion refused because relationships still point at it */
export class ReferencedEntityError extends MemoryError {
  readonly kind = "referenced";
  readonly category = "Referenced";
}

/** Any other failure reported by the database layer */
export class DatabaseError extends MemoryError {
  readonly kind = "database";
  readonly category = "Database error";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
