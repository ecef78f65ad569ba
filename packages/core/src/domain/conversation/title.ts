import type { LlmGateway } from '../../ports/llm-gateway.js';
import { buildTitlePrompt } from '../deliberation/prompts.js';
import { DEFAULT_CONVERSATION_TITLE } from './conversation.js';
import { queryModel } from '../council/query-model.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('title');

export const TITLE_TIMEOUT_MS = 30_000;
export const MAX_TITLE_LENGTH = 50;

export function cleanTitle(raw: string): string {
  const title = raw.trim().replace(/^["'`]+|["'`]+$/g, '').trim();
  if (!title) return DEFAULT_CONVERSATION_TITLE;
  if (title.length > MAX_TITLE_LENGTH) return `${title.slice(0, MAX_TITLE_LENGTH - 3)}...`;
  return title;
}

export async function generateConversationTitle(
  question: string,
  options: { gateway: LlmGateway; model: string; signal?: AbortSignal },
): Promise<string> {
  const response = await queryModel(
    options.gateway,
    options.model,
    [{ role: 'user', content: buildTitlePrompt(question) }],
    { timeoutMs: TITLE_TIMEOUT_MS, signal: options.signal },
  );
  if (!response.ok) {
    log.warn(`title generation failed (${response.error.kind}), keeping the default`);
    return DEFAULT_CONVERSATION_TITLE;
  }
  return cleanTitle(response.content);
}
