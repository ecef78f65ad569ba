import type { CouncilSnapshot } from '../council/council-config.js';
import type { LlmGateway } from '../../ports/llm-gateway.js';
import { noopEvents, type DeliberationEvents } from '../../ports/deliberation-events.js';
import type { StoredMessage } from '../conversation/conversation.js';
import type { DeliberationMode, TurnPhase, TurnResult } from './deliberation.js';
import { buildContextMessages } from '../conversation/context.js';
import {
  collectStage1Responses,
  collectStage2Rankings,
  runChairmanDirect,
  stage2Reviewers,
  synthesizeFinalAnswer,
  type StageContext,
} from './stages.js';
import { summarizeRankings } from './ranking.js';
import { TurnCancelledError } from '../../shared/errors.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('orchestrator');

export interface DeliberationTurnInput {
  history: readonly StoredMessage[];
  message: string;
  mode: DeliberationMode;
  snapshot: CouncilSnapshot;
  gateway: LlmGateway;
  events?: DeliberationEvents;
  signal?: AbortSignal;
}

/**
 * Runs one user turn:
 * building_context -> stage1 -> stage2 -> stage3 -> done, or
 * building_context -> stage3_only -> done in chairman mode.
 *
 * Model failures never reject; they land in the per-stage error lists. The
 * promise rejects only when the turn is cancelled, in which case the batch
 * that was running is discarded.
 */
export async function runDeliberationTurn(input: DeliberationTurnInput): Promise<TurnResult> {
  const { history, message, mode, snapshot, gateway, signal } = input;
  const events = input.events ?? noopEvents;
  const ctx: StageContext = { snapshot, gateway, events, signal };

  let phase: TurnPhase = 'building_context';
  const enter = (next: TurnPhase) => {
    log.debug(`${phase} -> ${next}`);
    phase = next;
  };
  const checkpoint = () => {
    if (signal?.aborted) throw new TurnCancelledError(phase);
  };

  try {
    log.info(`turn started: mode=${mode}, ${snapshot.councilModels.length} council model(s), chairman=${snapshot.chairmanModel}`);
    const context = await buildContextMessages(history, message, {
      gateway,
      summaryModel: snapshot.chairmanModel,
      signal,
    });
    checkpoint();

    if (mode === 'chairman') {
      enter('stage3_only');
      events.onStageStart(3, [snapshot.chairmanModel]);
      const stage3 = await runChairmanDirect(context, ctx);
      checkpoint();
      events.onStage3Complete(stage3.result, stage3.errors);

      enter('done');
      const result: TurnResult = { mode: 'chairman', stage3: stage3.result, stage3Errors: stage3.errors };
      events.onComplete(result);
      return result;
    }

    enter('stage1');
    events.onStageStart(1, snapshot.councilModels);
    const stage1 = await collectStage1Responses(context, ctx);
    checkpoint();
    events.onStage1Complete(stage1.results, stage1.errors);

    enter('stage2');
    events.onStageStart(2, stage2Reviewers(stage1.results));
    const stage2 = await collectStage2Rankings(message, stage1.results, ctx);
    checkpoint();
    const summary = summarizeRankings(stage2.results, stage2.labelToModel);
    events.onStage2Complete(stage2.results, summary, stage2.errors);

    enter('stage3');
    events.onStageStart(3, [snapshot.chairmanModel]);
    const stage3 = await synthesizeFinalAnswer(message, stage1.results, stage2.results, summary, ctx);
    checkpoint();
    events.onStage3Complete(stage3.result, stage3.errors);

    enter('done');
    const result: TurnResult = {
      mode: 'council',
      stage1: stage1.results,
      stage1Errors: stage1.errors,
      stage2: stage2.results,
      stage2Errors: stage2.errors,
      ...summary,
      stage3: stage3.result,
      stage3Errors: stage3.errors,
    };
    log.info(
      `turn finished: ${stage1.results.length} answer(s), ${stage2.results.length} ranking(s), ` +
        `final answer ${stage3.result.response === null ? 'missing' : 'ready'}`,
    );
    events.onComplete(result);
    return result;
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    log.error(`turn failed during ${phase}: ${reason}`);
    events.onError(reason);
    throw err;
  }
}
