import type {
  DeliberationEvents,
  ModelQueryError,
  RankingSummary,
  RawRanking,
  Stage1Result,
  Stage3Result,
  StageNumber,
  TurnResult,
} from '@synod/core';

export type EventHandler = {
  onStageStart?: (stage: StageNumber, models: readonly string[]) => void;
  onMemberComplete?: (stage: StageNumber, model: string, error: ModelQueryError | null) => void;
  onStage1Complete?: (results: Stage1Result[], errors: ModelQueryError[]) => void;
  onStage2Complete?: (rankings: RawRanking[], summary: RankingSummary, errors: ModelQueryError[]) => void;
  onStage3Complete?: (result: Stage3Result, errors: ModelQueryError[]) => void;
  onTitle?: (title: string) => void;
  onComplete?: (result: TurnResult) => void;
  onError?: (error: string) => void;
};

export function createCallbackEventBridge(handlers: EventHandler): DeliberationEvents {
  return {
    onStageStart: (stage, models) => handlers.onStageStart?.(stage, models),
    onMemberComplete: (stage, model, error) => handlers.onMemberComplete?.(stage, model, error),
    onStage1Complete: (results, errors) => handlers.onStage1Complete?.(results, errors),
    onStage2Complete: (rankings, summary, errors) => handlers.onStage2Complete?.(rankings, summary, errors),
    onStage3Complete: (result, errors) => handlers.onStage3Complete?.(result, errors),
    onTitle: (title) => handlers.onTitle?.(title),
    onComplete: (result) => handlers.onComplete?.(result),
    onError: (error) => handlers.onError?.(error),
  };
}
