import type { ChatMessage, LlmGateway } from '../../ports/llm-gateway.js';
import { buildSummaryPrompt } from '../deliberation/prompts.js';
import { finalAnswerOf, type StoredMessage } from './conversation.js';
import { queryModel } from '../council/query-model.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('context');

/** Exchanges kept verbatim; anything older is folded into one summary. */
export const RECENT_EXCHANGES = 5;
export const SUMMARY_TIMEOUT_MS = 30_000;
/** Cap on the transcript sent for summarization; the newest text is kept. */
export const MAX_SUMMARY_CHARS = 12_000;
export const TRUNCATION_PREFIX = '[Earlier conversation truncated]\n';
export const SUMMARY_PREFIX = 'Summary of the earlier conversation: ';

export interface ContextOptions {
  gateway: LlmGateway;
  /** Model that writes the summary of older exchanges. */
  summaryModel: string;
  signal?: AbortSignal;
}

/** Splits history into exchanges, each starting at a user message. */
export function groupExchanges(history: readonly StoredMessage[]): StoredMessage[][] {
  const exchanges: StoredMessage[][] = [];
  for (const message of history) {
    const current = exchanges.at(-1);
    if (message.role === 'user' || !current) {
      exchanges.push([message]);
    } else {
      current.push(message);
    }
  }
  return exchanges;
}

/**
 * User text as-is; assistant turns contribute only their final answer, and
 * not at all when there is none. Stored errors never go back to a model.
 */
export function toChatMessages(messages: readonly StoredMessage[]): ChatMessage[] {
  const out: ChatMessage[] = [];
  for (const message of messages) {
    if (message.role === 'user') {
      out.push({ role: 'user', content: message.content });
      continue;
    }
    const answer = finalAnswerOf(message);
    if (answer !== null) out.push({ role: 'assistant', content: answer });
  }
  return out;
}

export function renderTranscript(messages: readonly ChatMessage[]): string {
  const text = messages
    .map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`)
    .join('\n\n');
  if (text.length <= MAX_SUMMARY_CHARS) return text;
  return TRUNCATION_PREFIX + text.slice(text.length - MAX_SUMMARY_CHARS);
}

/** `null` when the summary call fails or comes back empty. */
export async function summarizeOlderMessages(
  older: readonly StoredMessage[],
  options: ContextOptions,
): Promise<string | null> {
  const transcript = renderTranscript(toChatMessages(older));
  if (!transcript) return null;

  const response = await queryModel(
    options.gateway,
    options.summaryModel,
    [{ role: 'user', content: buildSummaryPrompt(transcript) }],
    { timeoutMs: SUMMARY_TIMEOUT_MS, signal: options.signal },
  );
  if (!response.ok) {
    log.warn(`summary failed (${response.error.kind}): ${response.error.message}; using recent exchanges only`);
    return null;
  }
  const summary = response.content.trim();
  if (!summary) {
    log.warn('summary came back empty; using recent exchanges only');
    return null;
  }
  return summary;
}

/** Chronological message list for Stage 1 (or the chairman in direct mode). */
export async function buildContextMessages(
  history: readonly StoredMessage[],
  message: string,
  options: ContextOptions,
): Promise<ChatMessage[]> {
  const exchanges = groupExchanges(history);
  const next: ChatMessage = { role: 'user', content: message };

  if (exchanges.length <= RECENT_EXCHANGES) {
    return [...toChatMessages(history), next];
  }

  const older = exchanges.slice(0, -RECENT_EXCHANGES).flat();
  const recent = exchanges.slice(-RECENT_EXCHANGES).flat();
  log.info(`summarizing ${exchanges.length - RECENT_EXCHANGES} older exchange(s)`);

  const summary = await summarizeOlderMessages(older, options);
  const context: ChatMessage[] = summary === null ? [] : [{ role: 'system', content: SUMMARY_PREFIX + summary }];
  return [...context, ...toChatMessages(recent), next];
}
