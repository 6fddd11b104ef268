import type { StructuredToolInterface } from '@langchain/core/tools';
import { z } from 'zod';

// ============================================================================
// Tool Declaration
// ============================================================================

/**
 * A LangChain tool plus what the ToolExecutor needs around it: the argument
 * schema it validates against, the result schema and an optional timeout.
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  tool: StructuredToolInterface;
  argumentSchema: z.AnyZodObject;
  resultSchema: z.ZodTypeAny;
  /** Per-call timeout; the executor default applies when omitted. */
  timeoutMs?: number;
}

export type ToolErrorKind =
  | 'unknown_tool'
  | 'invalid_arguments'
  | 'timeout'
  | 'execution_failed'
  | 'cancelled';

export interface ToolError {
  kind: ToolErrorKind;
  message: string;
}

export interface DeclareToolOptions {
  resultSchema: z.ZodTypeAny;
  timeoutMs?: number;
}

/**
 * Declares a tool built on a zod object schema.
 */
export function declareTool(tool: StructuredToolInterface, options: DeclareToolOptions): ToolDeclaration {
  if (!(tool.schema instanceof z.ZodObject)) {
    throw new Error(`Tool ${tool.name} must take a zod object schema`);
  }
  return {
    name: tool.name,
    description: tool.description,
    tool,
    argumentSchema: tool.schema,
    resultSchema: options.resultSchema,
    timeoutMs: options.timeoutMs,
  };
}

// ============================================================================
// Tool Registry
// ============================================================================

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDeclaration>();

  constructor(tools: ToolDeclaration[] = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: ToolDeclaration): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, tool);
  }

  get(name: string): ToolDeclaration | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  list(): ToolDeclaration[] {
    return Array.from(this.tools.values());
  }

  /**
   * Returns the declarations for the requested names, skipping names that are
   * not registered (e.g. web search without an API key).
   */
  declarationsFor(names: readonly string[]): ToolDeclaration[] {
    return names
      .map(name => this.tools.get(name))
      .filter((tool): tool is ToolDeclaration => tool !== undefined);
  }
}
