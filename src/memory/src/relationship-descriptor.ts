// Codec for the "type:key1=value1,key2=value2" relationship descriptor
import { FormatError } from './errors.js';

export interface RelationshipDescriptor {
  type: string;
  properties: Record<string, string>;
}

const FORMAT_HINT = "Use format like 'works_at:position=developer,department=RnD' or simple 'knows'";

/**
 * Parses a descriptor into its relationship type and property map.
 *
 * Only the first `:` separates the type from the property list, and only the
 * first `=` of each property separates key from value, so values may contain
 * `=`. A property without `=` or with an empty key is rejected.
 */
export function parseRelationshipDescriptor(descriptor: string): RelationshipDescriptor {
  const separator = descriptor.indexOf(":");
  const type = (separator === -1 ? descriptor : descriptor.slice(0, separator)).trim();
  if (type === "") {
    throw new FormatError(`Relationship type is empty in "${descriptor}"`, FORMAT_HINT);
  }

  const properties: Record<string, string> = {};
  const propertyList = separator === -1 ? "" : descriptor.slice(separator + 1);
  if (propertyList.trim() === "") {
    return { type, properties };
  }

  for (const segment of propertyList.split(",")) {
    const equals = segment.indexOf("=");
    const key = equals === -1 ? "" : segment.slice(0, equals).trim();
    if (key === "") {
      throw new FormatError(
        `Expected format: "type:key1=value1,key2=value2", but got: "${descriptor}"`,
        FORMAT_HINT
      );
    }
    properties[key] = segment.slice(equals + 1).trim();
  }

  return { type, properties };
}

/**
 * Inverse of parseRelationshipDescriptor. Throws when the result would not
 * parse back to the same type and properties.
 */
export function serializeRelationshipDescriptor({ type, properties }: RelationshipDescriptor): string {
  if (type.trim() !== type || type === "" || type.includes(":")) {
    throw new FormatError(`Relationship type "${type}" cannot be encoded`, FORMAT_HINT);
  }

  const segments = Object.entries(properties).map(([key, value]) => {
    if (key === "" || key.trim() !== key || /[=,]/.test(key)) {
      throw new FormatError(`Property key "${key}" cannot be encoded`, FORMAT_HINT);
    }
    if (value.trim() !== value || value.includes(",")) {
      throw new FormatError(`Value of property "${key}" cannot be encoded`, FORMAT_HINT);
    }
    return `${key}=${value}`;
  });

  return segments.length === 0 ? type : `${type}:${segments.join(",")}`;
}
