// This module defines the tool contract and the build-once, read-only registry the dispatcher looks tools up in.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { BackendRpcClient } from '../types/domain.js';
import type { JsonValue, McpTool } from '../types/mcp.js';
import { AppError, DuplicateToolError, ToolExecutionError, UnknownToolError } from '../utils/errors.js';

export interface ToolContext {
  backend: BackendRpcClient;
  logger: FastifyBaseLogger;
  rpcTraceId: string;
}

export interface ToolDefinition<TSchema extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: TSchema;
  handler(context: ToolContext, args: z.output<TSchema>): Promise<JsonValue>;
}

// Type-erased tool as stored in the registry: one capability, validated arguments in and JSON out.
export interface RegisteredTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Readonly<Record<string, unknown>>;
  readonly requiredFields: readonly string[];
  invoke(context: ToolContext, args: Record<string, unknown>): Promise<JsonValue>;
}

// This helper renders a zod schema into the inline JSON Schema object advertised by tools/list.
function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const { $schema: _ignored, ...jsonSchema } = zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<string, unknown>;
  return jsonSchema;
}

function readRequiredFields(inputSchema: Record<string, unknown>): string[] {
  const required = inputSchema.required;
  return Array.isArray(required) ? required.filter((field): field is string => typeof field === 'string') : [];
}

// This function wraps one typed tool definition so its handler only ever sees schema-validated arguments.
export function defineTool<TSchema extends z.ZodTypeAny>(definition: ToolDefinition<TSchema>): RegisteredTool {
  const inputSchema = toInputSchema(definition.inputSchema);

  return Object.freeze({
    name: definition.name,
    description: definition.description,
    inputSchema: Object.freeze(inputSchema),
    requiredFields: Object.freeze(readRequiredFields(inputSchema)),
    async invoke(context: ToolContext, args: Record<string, unknown>): Promise<JsonValue> {
      const parsed = definition.inputSchema.safeParse(args);
      if (!parsed.success) {
        throw new ToolExecutionError(`Tool input validation failed for ${definition.name}.`, parsed.error.flatten());
      }

      return definition.handler(context, parsed.data);
    }
  });
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private frozen = false;

  public register(tool: RegisteredTool): void {
    if (this.frozen) {
      throw new AppError(409, 'registry_frozen', `Cannot register ${tool.name} after startup.`);
    }

    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }

    this.tools.set(tool.name, tool);
  }

  public freeze(): this {
    this.frozen = true;
    return this;
  }

  public get isFrozen(): boolean {
    return this.frozen;
  }

  public get size(): number {
    return this.tools.size;
  }

  public lookup(name: string): RegisteredTool {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new UnknownToolError(name);
    }

    return tool;
  }

  // Each iteration walks the map afresh in insertion order, so the listing is restartable.
  public list(): Iterable<McpTool> {
    const tools = this.tools;
    return {
      *[Symbol.iterator]() {
        for (const tool of tools.values()) {
          yield {
            name: tool.name,
            description: tool.description,
            inputSchema: { ...tool.inputSchema }
          };
        }
      }
    };
  }
}

// This function performs the one-time registration step run at bootstrap.
export function buildToolRegistry(tools: Iterable<RegisteredTool>): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) {
    registry.register(tool);
  }

  return registry.freeze();
}
