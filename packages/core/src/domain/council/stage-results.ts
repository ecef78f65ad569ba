import type { ModelQueryError } from './model-error.js';

export interface CouncilTokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Stage1Result {
  model: string;
  content: string;
  usage?: CouncilTokenUsage | null;
}

/** Label such as `A`, `B`, ..., `AA`; shown to models as `Response A`. */
export type ResponseLabel = string;

export interface AnonymizedResponse {
  label: ResponseLabel;
  model: string;
  content: string;
}

export interface RawRanking {
  model: string;
  rankingText: string;
  /** Best first. Empty when the reply had no usable ranking. */
  parsedRanking: ResponseLabel[];
  usage?: CouncilTokenUsage | null;
}

export interface Stage3Result {
  model: string;
  /** `null` when the chairman call failed. */
  response: string | null;
  usage?: CouncilTokenUsage | null;
}

export interface StageOutcome<T> {
  results: T[];
  errors: ModelQueryError[];
}
