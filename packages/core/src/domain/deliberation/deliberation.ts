import type { ModelQueryError } from '../council/model-error.js';
import type { RawRanking, ResponseLabel, Stage1Result, Stage3Result } from '../council/stage-results.js';

export type DeliberationMode = 'council' | 'chairman';

export type TurnPhase = 'building_context' | 'stage1' | 'stage2' | 'stage3' | 'stage3_only' | 'done';

export interface AggregateRankingEntry {
  model: string;
  label: ResponseLabel;
  /** Mean 1-indexed position over the rankings that mention this response; lower is better. */
  averageRank: number;
  rankingsCount: number;
}

export interface TournamentRankingEntry {
  model: string;
  label: ResponseLabel;
  /** Head-to-head matchups won, lost and drawn against the other responses. */
  wins: number;
  losses: number;
  ties: number;
  /** `wins - losses` */
  score: number;
  rankingsCount: number;
}

export interface RankingSummary {
  labelToModel: Record<ResponseLabel, string>;
  aggregateRankings: AggregateRankingEntry[];
  tournamentRankings: TournamentRankingEntry[];
}

export interface CouncilTurnResult extends RankingSummary {
  mode: 'council';
  stage1: Stage1Result[];
  stage1Errors: ModelQueryError[];
  stage2: RawRanking[];
  stage2Errors: ModelQueryError[];
  stage3: Stage3Result;
  stage3Errors: ModelQueryError[];
}

export interface ChairmanTurnResult {
  mode: 'chairman';
  stage3: Stage3Result;
  stage3Errors: ModelQueryError[];
}

export type TurnResult = CouncilTurnResult | ChairmanTurnResult;

export function allTurnErrors(result: TurnResult): ModelQueryError[] {
  if (result.mode === 'chairman') return [...result.stage3Errors];
  return [...result.stage1Errors, ...result.stage2Errors, ...result.stage3Errors];
}
