import type { z } from 'zod';
import type { ToolDeclaration } from '../tools/types.js';

export interface ProviderRequest {
  systemPrompt: string;
  prompt: string;
  /** Tools the model may ask for. Empty means plain completion. */
  tools: readonly ToolDeclaration[];
  temperature: number;
  signal?: AbortSignal;
}

export type ProviderResponse =
  | { type: 'final'; text: string }
  | { type: 'tool_request'; toolName: string; arguments: Record<string, unknown> };

/**
 * Stateless access to an inference service. Everything the model needs to
 * know is carried in the request. Failures are thrown as `ProviderError`.
 */
export interface ProviderClient {
  complete(request: ProviderRequest): Promise<ProviderResponse>;
}

/**
 * One-shot call whose output is parsed against a schema.
 */
export interface StructuredProvider {
  completeStructured<T extends Record<string, unknown>>(
    schema: z.ZodType<T>,
    systemPrompt: string,
    prompt: string,
    signal?: AbortSignal
  ): Promise<T>;
}
