import type { Static, TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { StockImageError, invalidParameter } from '../errors.js';
import { logger } from '../logger.js';
import { sanitizeErrorForResponse } from '../utils.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface ToolContext {
  signal?: AbortSignal;
}

export interface ToolDefinition<S extends TObject> {
  name: string;
  description: string;
  schema: S;
  handler: (params: Static<S>, context: ToolContext) => Promise<ToolResult>;
}

export type ToolListing = {
  name: string;
  description: string;
  inputSchema: {
    type: 'object';
    properties: Record<string, object>;
    required?: string[];
  };
};

interface RegisteredTool {
  listing: ToolListing;
  call(args: unknown, context: ToolContext): Promise<ToolResult>;
}

export function jsonResult(value: unknown, isError: boolean = false): ToolResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

export function errorResult(error: unknown): ToolResult {
  if (error instanceof StockImageError) {
    return jsonResult({ error: error.toJSON() }, true);
  }
  return jsonResult({ error: { message: sanitizeErrorForResponse(error) } }, true);
}

/**
 * Tools keyed by name. Arguments are checked against the tool's TypeBox
 * schema; a mismatch becomes an InvalidParameter result.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  addTool<S extends TObject>(tool: ToolDefinition<S>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }

    this.tools.set(tool.name, {
      listing: {
        name: tool.name,
        description: tool.description,
        inputSchema: {
          type: 'object',
          properties: tool.schema.properties,
          required: tool.schema.required,
        },
      },
      call: async (args, context) => {
        const params = args ?? {};
        if (!Value.Check(tool.schema, params)) {
          const first = Value.Errors(tool.schema, params).First();
          throw invalidParameter(
            first ? `${first.path || 'arguments'}: ${first.message}` : 'arguments do not match the tool schema'
          );
        }
        return tool.handler(params, context);
      },
    });
  }

  list(): ToolListing[] {
    return [...this.tools.values()].map((tool) => tool.listing);
  }

  async call(name: string, args: unknown, context: ToolContext = {}): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      return jsonResult({ error: { message: `Unknown tool: ${name}` } }, true);
    }

    logger.request(name);
    try {
      const result = await tool.call(args, context);
      logger.response(name, !result.isError);
      return result;
    } catch (error) {
      logger.response(name, false, error);
      return errorResult(error);
    }
  }
}
