import type { ChatMessage, LlmGateway, LlmQueryOptions, LlmResponse } from '../../ports/llm-gateway.js';
import { createModelQueryError } from './model-error.js';

/** `gateway.query`, with a rejected call folded into an `unknown` failure for that model. */
export function queryModel(
  gateway: LlmGateway,
  model: string,
  messages: readonly ChatMessage[],
  options?: LlmQueryOptions,
): Promise<LlmResponse> {
  return gateway
    .query(model, messages, options)
    .catch((err: unknown): LlmResponse => ({
      ok: false,
      error: createModelQueryError(model, 'unknown', err instanceof Error ? err.message : String(err)),
    }));
}
