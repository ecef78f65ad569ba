import type { ModelQueryError } from '../domain/council/model-error.js';
import type { RawRanking, Stage1Result, Stage3Result } from '../domain/council/stage-results.js';
import type { RankingSummary, TurnResult } from '../domain/deliberation/deliberation.js';
import type { DeliberationEvents, StageNumber } from '../ports/deliberation-events.js';

export type DeliberationEvent =
  | { type: 'stage1_start'; models: string[] }
  | { type: 'stage1_complete'; results: Stage1Result[]; errors: ModelQueryError[] }
  | { type: 'stage2_start'; models: string[] }
  | { type: 'stage2_complete'; rankings: RawRanking[]; summary: RankingSummary; errors: ModelQueryError[] }
  | { type: 'stage3_start'; models: string[] }
  | { type: 'stage3_complete'; result: Stage3Result; errors: ModelQueryError[] }
  | { type: 'member_complete'; stage: StageNumber; model: string; error: ModelQueryError | null }
  | { type: 'title'; title: string }
  | { type: 'complete'; result: TurnResult }
  | { type: 'error'; message: string };

const START_EVENTS = {
  1: 'stage1_start',
  2: 'stage2_start',
  3: 'stage3_start',
} as const satisfies Record<StageNumber, DeliberationEvent['type']>;

/**
 * Turns the callback interface into an async iterable of events, for callers
 * that consume a turn as a stream. Single consumer; iteration ends after
 * `close()` once the buffered events are drained.
 */
export class EventStream implements DeliberationEvents, AsyncIterable<DeliberationEvent> {
  private queue: DeliberationEvent[] = [];
  private wake: (() => void) | null = null;
  private closed = false;

  push(event: DeliberationEvent): void {
    if (this.closed) return;
    this.queue.push(event);
    this.notify();
  }

  close(): void {
    this.closed = true;
    this.notify();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<DeliberationEvent> {
    for (;;) {
      const next = this.queue.shift();
      if (next) {
        yield next;
        continue;
      }
      if (this.closed) return;
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  onStageStart(stage: StageNumber, models: readonly string[]): void {
    this.push({ type: START_EVENTS[stage], models: [...models] });
  }

  onMemberComplete(stage: StageNumber, model: string, error: ModelQueryError | null): void {
    this.push({ type: 'member_complete', stage, model, error });
  }

  onStage1Complete(results: Stage1Result[], errors: ModelQueryError[]): void {
    this.push({ type: 'stage1_complete', results, errors });
  }

  onStage2Complete(rankings: RawRanking[], summary: RankingSummary, errors: ModelQueryError[]): void {
    this.push({ type: 'stage2_complete', rankings, summary, errors });
  }

  onStage3Complete(result: Stage3Result, errors: ModelQueryError[]): void {
    this.push({ type: 'stage3_complete', result, errors });
  }

  onTitle(title: string): void {
    this.push({ type: 'title', title });
  }

  onComplete(result: TurnResult): void {
    this.push({ type: 'complete', result });
  }

  onError(message: string): void {
    this.push({ type: 'error', message });
  }
}

/** Forwards every callback to each target in order. */
export function teeEvents(...targets: DeliberationEvents[]): DeliberationEvents {
  return {
    onStageStart: (stage, models) => targets.forEach((t) => t.onStageStart(stage, models)),
    onMemberComplete: (stage, model, error) => targets.forEach((t) => t.onMemberComplete(stage, model, error)),
    onStage1Complete: (results, errors) => targets.forEach((t) => t.onStage1Complete(results, errors)),
    onStage2Complete: (rankings, summary, errors) => targets.forEach((t) => t.onStage2Complete(rankings, summary, errors)),
    onStage3Complete: (result, errors) => targets.forEach((t) => t.onStage3Complete(result, errors)),
    onTitle: (title) => targets.forEach((t) => t.onTitle(title)),
    onComplete: (result) => targets.forEach((t) => t.onComplete(result)),
    onError: (message) => targets.forEach((t) => t.onError(message)),
  };
}
