// MCP tool definitions and dispatch onto the knowledge graph manager
import { ErrorCode, McpError, type CallToolResult, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { KnowledgeGraphManager } from './knowledge-graph-manager.js';

const FIRST_CALL_HINT = "If this is your first memory operation in this session, call get_usage_guide first.";

const RELATIONSHIP_TYPE_DESCRIPTION =
  'Type and properties of the relationship in format "type:key1=value1,key2=value2", e.g. "works_at:position=developer,department=RnD". A type without properties: "knows"';

export const TOOLS: Tool[] = [
  {
    name: "create_entities",
    description: `Create entities in memory. Each entity must have a unique name. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        entities: {
          type: "array",
          items: {
            type: "object",
            properties: {
              name: { type: "string", description: "Unique name of the entity" },
              type: { type: "string", description: "Free-form category of the entity" },
              data: { type: "object", description: "Arbitrary attributes of the entity" },
            },
            required: ["name"],
          },
        },
      },
      required: ["entities"],
    },
  },
  {
    name: "get_entity",
    description: `Get a single entity by its name. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Unique name of the entity to retrieve" },
      },
      required: ["name"],
    },
  },
  {
    name: "update_entity",
    description: `Update a single entity by its name with a MongoDB update document. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Unique name of the entity to update" },
        update: {
          type: "object",
          description: 'MongoDB update document, e.g. {"$set": {"data.status": "active"}}',
        },
        upsert: { type: "boolean", description: "Create the entity if it does not exist", default: false },
      },
      required: ["name", "update"],
    },
  },
  {
    name: "delete_entity",
    description: `Delete a single entity by its name. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Unique name of the entity to delete" },
      },
      required: ["name"],
    },
  },
  {
    name: "find_entities",
    description: `Find entities matching a MongoDB query. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "object", description: "MongoDB query document. Must not be empty." },
        limit: { type: "integer", description: "Maximum number of entities to return", default: 10 },
      },
      required: ["query"],
    },
  },
  {
    name: "create_relationship",
    description: `Create a relationship between two existing entities. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        from_entity: { type: "string", description: "Name of the source entity" },
        to_entity: { type: "string", description: "Name of the target entity" },
        relationship_type: { type: "string", description: RELATIONSHIP_TYPE_DESCRIPTION },
        properties: {
          type: "object",
          additionalProperties: { type: "string" },
          description: "Extra properties; keys also given in relationship_type take the value from relationship_type",
        },
      },
      required: ["from_entity", "to_entity", "relationship_type"],
    },
  },
  {
    name: "get_relationships",
    description: `Get relationships page by page, optionally filtered by a MongoDB query. Pass page_info.next_cursor as cursor to read the next page. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "object", description: 'MongoDB query document, e.g. {"type": "imports"}' },
        limit: { type: "integer", minimum: 1, maximum: 100, description: "Page size between 1 and 100", default: 10 },
        cursor: { type: "string", description: "next_cursor of the previous page" },
      },
    },
  },
  {
    name: "delete_relationship",
    description: `Delete a relationship between two entities. Only a relationship whose properties equal those in relationship_type exactly is deleted; a bare type matches a relationship without properties. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {
        from_entity: { type: "string", description: "Name of the source entity" },
        to_entity: { type: "string", description: "Name of the target entity" },
        relationship_type: { type: "string", description: RELATIONSHIP_TYPE_DESCRIPTION },
      },
      required: ["from_entity", "to_entity", "relationship_type"],
    },
  },
  {
    name: "get_memory_structure",
    description: `Get the current memory structure: known entity fields and their values. ${FIRST_CALL_HINT}`,
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
  {
    name: "get_usage_guide",
    description:
      "Recommended first step: get a quick start guide with examples for this memory service. Skip it when memory context is already clear or the guide was already read in this conversation.",
    inputSchema: {
      type: "object",
      properties: {},
    },
  },
];

const ToolArguments = {
  create_entities: z.object({ entities: z.array(z.unknown()) }),
  get_entity: z.object({ name: z.string() }),
  update_entity: z.object({
    name: z.string(),
    update: z.record(z.unknown()),
    upsert: z.boolean().default(false),
  }),
  delete_entity: z.object({ name: z.string() }),
  find_entities: z.object({ query: z.unknown(), limit: z.number().default(10) }),
  create_relationship: z.object({
    from_entity: z.string(),
    to_entity: z.string(),
    relationship_type: z.string(),
    properties: z.record(z.string()).optional(),
  }),
  get_relationships: z.object({
    query: z.unknown().optional(),
    limit: z.number().default(10),
    cursor: z.string().optional(),
  }),
  delete_relationship: z.object({
    from_entity: z.string(),
    to_entity: z.string(),
    relationship_type: z.string(),
  }),
};

function parseArguments<T extends z.ZodTypeAny>(tool: string, schema: T, args: unknown): z.output<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join(".") || "arguments"}: ${issue.message}`);
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool ${tool}: ${problems.join("; ")}`);
  }
  return parsed.data;
}

function jsonResult(result: { success: boolean }): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
    isError: !result.success,
  };
}

/**
 * Runs one tool call. Store outcomes, failures included, come back as JSON
 * text; malformed arguments and unknown tools raise McpError.
 */
export async function handleToolCall(
  manager: KnowledgeGraphManager,
  name: string,
  args: Record<string, unknown> | undefined
): Promise<CallToolResult> {
  switch (name) {
    // Entity operations
    case "create_entities": {
      const { entities } = parseArguments(name, ToolArguments.create_entities, args);
      return jsonResult(await manager.entities.createEntities(entities));
    }

    case "get_entity": {
      const { name: entityName } = parseArguments(name, ToolArguments.get_entity, args);
      return jsonResult(await manager.entities.getEntity(entityName));
    }

    case "update_entity": {
      const { name: entityName, update, upsert } = parseArguments(name, ToolArguments.update_entity, args);
      return jsonResult(await manager.entities.updateEntity(entityName, update, upsert));
    }

    case "delete_entity": {
      const { name: entityName } = parseArguments(name, ToolArguments.delete_entity, args);
      return jsonResult(await manager.entities.deleteEntity(entityName));
    }

    case "find_entities": {
      const { query, limit } = parseArguments(name, ToolArguments.find_entities, args);
      return jsonResult(await manager.entities.findEntities(query, limit));
    }

    // Relationship operations
    case "create_relationship": {
      const parsed = parseArguments(name, ToolArguments.create_relationship, args);
      return jsonResult(
        await manager.relationships.createRelationship(
          parsed.from_entity,
          parsed.to_entity,
          parsed.relationship_type,
          parsed.properties
        )
      );
    }

    case "get_relationships": {
      const { query, limit, cursor } = parseArguments(name, ToolArguments.get_relationships, args);
      return jsonResult(await manager.relationships.getRelationships({ query, limit, cursor }));
    }

    case "delete_relationship": {
      const parsed = parseArguments(name, ToolArguments.delete_relationship, args);
      return jsonResult(
        await manager.relationships.deleteRelationship(parsed.from_entity, parsed.to_entity, parsed.relationship_type)
      );
    }

    // Read-only views
    case "get_memory_structure":
      return jsonResult(await manager.getMemoryStructure());

    case "get_usage_guide":
      return { content: [{ type: "text", text: await manager.getUsageGuide() }] };

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}
