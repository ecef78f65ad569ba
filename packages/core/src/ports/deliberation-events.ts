import type { ModelQueryError } from '../domain/council/model-error.js';
import type { RawRanking, Stage1Result, Stage3Result } from '../domain/council/stage-results.js';
import type { RankingSummary, TurnResult } from '../domain/deliberation/deliberation.js';

export type StageNumber = 1 | 2 | 3;

/**
 * Checkpoints over a turn, for progressive rendering. Purely observational:
 * nothing a listener does feeds back into the turn.
 */
export interface DeliberationEvents {
  onStageStart(stage: StageNumber, models: readonly string[]): void;
  onMemberComplete(stage: StageNumber, model: string, error: ModelQueryError | null): void;
  onStage1Complete(results: Stage1Result[], errors: ModelQueryError[]): void;
  onStage2Complete(rankings: RawRanking[], summary: RankingSummary, errors: ModelQueryError[]): void;
  onStage3Complete(result: Stage3Result, errors: ModelQueryError[]): void;
  onTitle(title: string): void;
  onComplete(result: TurnResult): void;
  onError(message: string): void;
}

export const noopEvents: DeliberationEvents = {
  onStageStart: () => {},
  onMemberComplete: () => {},
  onStage1Complete: () => {},
  onStage2Complete: () => {},
  onStage3Complete: () => {},
  onTitle: () => {},
  onComplete: () => {},
  onError: () => {},
};
