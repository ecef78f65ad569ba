import { z } from 'zod';
import type { ChatMessage, LlmGateway, LlmQueryOptions, LlmResponse } from '../ports/llm-gateway.js';
import type { CouncilTokenUsage } from '../domain/council/stage-results.js';
import { applyOnlineVariant, OPENROUTER_API_URL } from '../domain/council/council-config.js';
import { classifyHttpFailure, createModelQueryError, type ModelQueryError } from '../domain/council/model-error.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('openrouter');

const DEFAULT_TIMEOUT_MS = 120_000;

const CompletionSchema = z
  .object({
    choices: z
      .array(
        z
          .object({
            message: z.object({ content: z.string().nullable().optional() }).passthrough(),
          })
          .passthrough(),
      )
      .default([]),
    usage: z
      .object({
        prompt_tokens: z.number().optional(),
        completion_tokens: z.number().optional(),
        total_tokens: z.number().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

type CompletionUsage = z.infer<typeof CompletionSchema>['usage'];

function toUsage(usage: CompletionUsage): CouncilTokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens ?? 0,
    completionTokens: usage.completion_tokens ?? 0,
    totalTokens: usage.total_tokens ?? 0,
  };
}

function fail(error: ModelQueryError): LlmResponse {
  return { ok: false, error };
}

export interface OpenRouterGatewayOptions {
  apiKey: string;
  apiUrl?: string;
  /** Defaults to the global `fetch`. */
  fetchImpl?: typeof fetch;
}

/**
 * Chat completions over OpenRouter. Errors are reported against the model id
 * the caller asked for, even when the `:online` variant was requested.
 */
export class OpenRouterGateway implements LlmGateway {
  private readonly apiKey: string;
  private readonly apiUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenRouterGatewayOptions) {
    this.apiKey = options.apiKey;
    this.apiUrl = options.apiUrl ?? OPENROUTER_API_URL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async query(model: string, messages: readonly ChatMessage[], options: LlmQueryOptions = {}): Promise<LlmResponse> {
    if (!this.apiKey) {
      log.error('OPENROUTER_API_KEY is missing');
      return fail(createModelQueryError(model, 'auth', 'OPENROUTER_API_KEY is not configured.'));
    }

    const requested = options.webSearch ? applyOnlineVariant(model) : model;
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);
    const onCancel = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    } else {
      options.signal?.addEventListener('abort', onCancel, { once: true });
    }

    log.debug(`request to ${requested} (timeout: ${timeoutMs}ms)`);
    try {
      const response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'X-Title': 'Synod',
        },
        body: JSON.stringify({ model: requested, messages }),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text().catch(() => '');
        log.error(`HTTP ${response.status} for ${requested}`, body.slice(0, 500));
        return fail(classifyHttpFailure(model, response.status, body));
      }

      const json: unknown = await response.json();
      const parsed = CompletionSchema.safeParse(json);
      if (!parsed.success) {
        log.warn(`unexpected response shape from ${requested}: ${parsed.error.message}`);
        return fail(createModelQueryError(model, 'unknown', 'Malformed response from OpenRouter.'));
      }

      const first = parsed.data.choices.at(0);
      if (!first) {
        log.warn(`no choices in response for ${requested}`);
        return fail(createModelQueryError(model, 'unknown', 'OpenRouter returned no choices.'));
      }

      const content = first.message.content ?? '';
      log.info(`success for ${requested}, content length: ${content.length} chars`);
      const usage = toUsage(parsed.data.usage);
      return usage ? { ok: true, model, content, usage } : { ok: true, model, content };
    } catch (err) {
      if (timedOut) {
        log.warn(`${requested} timed out after ${timeoutMs}ms`);
        return fail(createModelQueryError(model, 'timeout', `Request timed out after ${Math.round(timeoutMs / 1000)}s.`));
      }
      if (options.signal?.aborted) {
        return fail(createModelQueryError(model, 'unknown', 'Request cancelled.'));
      }
      const message = err instanceof Error ? err.message : String(err);
      log.error(`exception for ${requested}: ${message}`);
      return fail(createModelQueryError(model, 'unknown', message));
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onCancel);
    }
  }
}
