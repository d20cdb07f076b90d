/**
 * Tool Registry
 *
 * Static table of the tools the bridge can dispatch to. Built once; the same
 * table drives dispatch and the `tools/list` advertisement.
 */

import { z } from 'zod';

import type {
  ToolCategory,
  ToolContext,
  ToolDefinition,
  ToolInputProperty,
  ToolInputSchema,
  ToolOutcome,
  ToolSchemaView,
} from './types.js';

interface ToolSpec<TSchema extends z.AnyZodObject> {
  name: string;
  description: string;
  category: ToolCategory;
  schema: TSchema;
  rateLimited: boolean;
  execute: (input: z.output<TSchema>, ctx: ToolContext) => Promise<ToolOutcome>;
}

/**
 * Erases a tool's input type so heterogeneous tools fit one table. The
 * wrapper re-applies the schema, so `execute` only ever sees parsed input.
 */
export function defineTool<TSchema extends z.AnyZodObject>(spec: ToolSpec<TSchema>): ToolDefinition {
  return {
    name: spec.name,
    description: spec.description,
    category: spec.category,
    schema: spec.schema,
    rateLimited: spec.rateLimited,
    execute: (input, ctx) => spec.execute(spec.schema.parse(input), ctx),
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDefinition> = new Map();

  constructor(definitions: readonly ToolDefinition[]) {
    for (const tool of definitions) {
      if (this.tools.has(tool.name)) {
        throw new Error(`Tool already registered: ${tool.name}`);
      }
      this.tools.set(tool.name, tool);
    }
  }

  /**
   * Get a tool by name.
   */
  resolve(name: string): ToolDefinition | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Tools in table order.
   */
  list(): ToolDefinition[] {
    return Array.from(this.tools.values());
  }

  listNames(): string[] {
    return this.list().map((tool) => tool.name);
  }

  /**
   * Schema-only view for `tools/list` and LLM tool calling.
   */
  listSchemas(): ToolSchemaView[] {
    return this.list().map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: zodToInputSchema(tool.schema),
    }));
  }
}

/**
 * Convert a flat Zod object schema to the JSON-schema subset tools advertise.
 */
export function zodToInputSchema(schema: z.AnyZodObject): ToolInputSchema {
  const properties: Record<string, ToolInputProperty> = {};
  const required: string[] = [];

  for (const [key, value] of Object.entries<z.ZodTypeAny>(schema.shape)) {
    const field = describeField(value);
    const property: ToolInputProperty = { type: field.type };
    if (field.description) property.description = field.description;
    if (field.hasDefault) property.default = field.defaultValue;
    properties[key] = property;
    if (!field.optional) {
      required.push(key);
    }
  }

  return required.length > 0
    ? { type: 'object', properties, required }
    : { type: 'object', properties };
}

interface FieldDescription {
  type: ToolInputProperty['type'];
  description?: string;
  optional: boolean;
  hasDefault: boolean;
  defaultValue?: unknown;
}

function describeField(schema: z.ZodTypeAny): FieldDescription {
  const field: FieldDescription = { type: 'string', optional: false, hasDefault: false };
  let current: z.ZodTypeAny = schema;

  // Peel wrappers, keeping the outermost description and default.
  for (;;) {
    if (!field.description && current.description) {
      field.description = current.description;
    }
    if (current instanceof z.ZodOptional) {
      field.optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodNullable) {
      field.optional = true;
      current = current.unwrap();
    } else if (current instanceof z.ZodDefault) {
      field.optional = true;
      if (!field.hasDefault) {
        field.hasDefault = true;
        field.defaultValue = current._def.defaultValue();
      }
      current = current.removeDefault();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else {
      break;
    }
  }

  field.type = jsonType(current);
  return field;
}

function jsonType(schema: z.ZodTypeAny): ToolInputProperty['type'] {
  if (schema instanceof z.ZodNumber) return schema.isInt ? 'integer' : 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodArray) return 'array';
  if (schema instanceof z.ZodObject) return 'object';
  return 'string';
}
