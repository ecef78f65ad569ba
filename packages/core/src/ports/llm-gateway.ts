import type { CouncilTokenUsage } from '../domain/council/stage-results.js';
import type { ModelQueryError } from '../domain/council/model-error.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface LlmQueryOptions {
  /** Ask for the web-search variant of the model for this call only. */
  webSearch?: boolean;
  timeoutMs?: number;
  /** Turn-level cancellation; aborts the in-flight request. */
  signal?: AbortSignal;
}

export type LlmResponse =
  | { ok: true; model: string; content: string; usage?: CouncilTokenUsage }
  | { ok: false; error: ModelQueryError };

/**
 * One chat-completion request to one model. Implementations never reject:
 * every failure comes back as a classified `ModelQueryError`.
 */
export interface LlmGateway {
  query(model: string, messages: readonly ChatMessage[], options?: LlmQueryOptions): Promise<LlmResponse>;
}
