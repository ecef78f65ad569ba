import { ConfigError } from '../../shared/errors.js';

export interface CouncilConfig {
  openRouterApiKey: string;
  openRouterApiUrl: string;
  councilModels: string[];
  chairmanModel: string;
  webSearchEnabled: boolean;
}

/**
 * The part of the configuration a single turn runs against. Taken once at the
 * start of the turn and frozen, so a configuration change mid-turn is not seen
 * by later stages.
 */
export interface CouncilSnapshot {
  readonly councilModels: readonly string[];
  readonly chairmanModel: string;
  readonly webSearchEnabled: boolean;
}

export const DEFAULT_COUNCIL_MODELS = [
  'openai/gpt-5.1',
  'google/gemini-3-pro-preview',
  'anthropic/claude-sonnet-4.5',
  'x-ai/grok-4',
];

export const DEFAULT_CHAIRMAN_MODEL = 'google/gemini-3-pro-preview';
export const OPENROUTER_API_URL = 'https://openrouter.ai/api/v1/chat/completions';

const ONLINE_SUFFIX = ':online';

/** OpenRouter's web-search variant of a model id. Idempotent; blank ids pass through. */
export function applyOnlineVariant(model: string): string {
  if (!model || model.endsWith(ONLINE_SUFFIX)) return model;
  return `${model}${ONLINE_SUFFIX}`;
}

export function snapshotCouncil(config: {
  councilModels: readonly string[];
  chairmanModel: string;
  webSearchEnabled?: boolean;
}): CouncilSnapshot {
  const councilModels = config.councilModels.map((m) => m.trim());
  if (councilModels.length === 0) {
    throw new ConfigError('At least one council model is required');
  }
  const blank = councilModels.findIndex((m) => m.length === 0);
  if (blank !== -1) {
    throw new ConfigError(`Council model at position ${blank + 1} is empty`);
  }
  const chairmanModel = config.chairmanModel.trim();
  if (!chairmanModel) {
    throw new ConfigError('A chairman model is required');
  }
  return Object.freeze({
    councilModels: Object.freeze([...councilModels]),
    chairmanModel,
    webSearchEnabled: config.webSearchEnabled ?? false,
  });
}
