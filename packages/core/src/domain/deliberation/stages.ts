import type { ModelQueryError } from '../council/model-error.js';
import type { CouncilSnapshot } from '../council/council-config.js';
import type { RawRanking, ResponseLabel, Stage1Result, Stage3Result, StageOutcome } from '../council/stage-results.js';
import type { ChatMessage, LlmGateway, LlmQueryOptions, LlmResponse } from '../../ports/llm-gateway.js';
import type { DeliberationEvents, StageNumber } from '../../ports/deliberation-events.js';
import type { RankingSummary } from './deliberation.js';
import { anonymizeResponses } from './anonymize.js';
import { parseRankingFromText } from './ranking.js';
import { buildRankingPrompt, buildSynthesisPrompt, CHAIRMAN_DIRECT_SYSTEM_PROMPT } from './prompts.js';
import { queryModel } from '../council/query-model.js';
import { createLogger } from '../../shared/logger.js';

const log = createLogger('stages');

/** Upper bound on any single model call, chairman included. */
export const MEMBER_TIMEOUT_MS = 120_000;

export interface StageContext {
  snapshot: CouncilSnapshot;
  gateway: LlmGateway;
  events?: DeliberationEvents;
  signal?: AbortSignal;
}

type Settled = { model: string; response: LlmResponse };
type LlmSuccess = Extract<LlmResponse, { ok: true }>;

/**
 * One gateway call per model, all in flight at once, joined by a single
 * barrier. Results come back in the order of `models`, whatever order the
 * calls finish in.
 */
async function fanOut(
  stage: StageNumber,
  models: readonly string[],
  messages: readonly ChatMessage[],
  options: LlmQueryOptions,
  ctx: StageContext,
): Promise<Settled[]> {
  const stageLog = log.child(`stage${stage}`);
  stageLog.info(`querying ${models.length} model(s)`);

  const tasks = models.map(async (model): Promise<Settled> => {
    const response = await queryModel(ctx.gateway, model, messages, options);
    if (!response.ok) {
      stageLog.warn(`${model} failed (${response.error.kind}): ${response.error.message}`);
    }
    ctx.events?.onMemberComplete(stage, model, response.ok ? null : response.error);
    return { model, response };
  });

  return Promise.all(tasks);
}

function split<T>(settled: Settled[], toResult: (model: string, content: string, response: LlmSuccess) => T): StageOutcome<T> {
  const results: T[] = [];
  const errors: ModelQueryError[] = [];
  for (const { model, response } of settled) {
    if (response.ok) {
      results.push(toResult(model, response.content, response));
    } else {
      errors.push(response.error);
    }
  }
  return { results, errors };
}

export async function collectStage1Responses(
  messages: readonly ChatMessage[],
  ctx: StageContext,
): Promise<StageOutcome<Stage1Result>> {
  const settled = await fanOut(
    1,
    ctx.snapshot.councilModels,
    messages,
    { webSearch: ctx.snapshot.webSearchEnabled, timeoutMs: MEMBER_TIMEOUT_MS, signal: ctx.signal },
    ctx,
  );
  const outcome = split(settled, (model, content, response) => ({ model, content, usage: response.usage ?? null }));
  log.info(`stage1: ${outcome.results.length} answer(s), ${outcome.errors.length} failure(s)`);
  return outcome;
}

export interface Stage2Outcome extends StageOutcome<RawRanking> {
  labelToModel: Record<ResponseLabel, string>;
}

/** Members that answered in Stage 1; a member that failed there does not review. */
export function stage2Reviewers(stage1: readonly Stage1Result[]): string[] {
  return stage1.map((r) => r.model);
}

export async function collectStage2Rankings(
  question: string,
  stage1: readonly Stage1Result[],
  ctx: StageContext,
): Promise<Stage2Outcome> {
  const { responses, labelToModel } = anonymizeResponses(stage1);
  if (responses.length === 0) {
    log.warn('stage2: no Stage 1 answers to rank, skipping');
    return { results: [], errors: [], labelToModel };
  }

  const labels = Object.keys(labelToModel);
  const prompt = buildRankingPrompt(question, responses);
  const settled = await fanOut(
    2,
    stage2Reviewers(stage1),
    [{ role: 'user', content: prompt }],
    { timeoutMs: MEMBER_TIMEOUT_MS, signal: ctx.signal },
    ctx,
  );

  const outcome = split(settled, (model, content, response) => {
    const parsedRanking = parseRankingFromText(content, labels);
    if (parsedRanking.length === 0) {
      log.warn(`stage2: no ranking could be read from ${model}'s reply`);
    }
    return { model, rankingText: content, parsedRanking, usage: response.usage ?? null };
  });
  log.info(`stage2: ${outcome.results.length} ranking(s), ${outcome.errors.length} failure(s)`);
  return { ...outcome, labelToModel };
}

export interface Stage3Outcome {
  result: Stage3Result;
  errors: ModelQueryError[];
}

async function askChairman(messages: readonly ChatMessage[], options: LlmQueryOptions, ctx: StageContext): Promise<Stage3Outcome> {
  const [{ model, response }] = await fanOut(3, [ctx.snapshot.chairmanModel], messages, options, ctx);
  if (!response.ok) {
    return { result: { model, response: null }, errors: [response.error] };
  }
  return { result: { model, response: response.content, usage: response.usage ?? null }, errors: [] };
}

export async function synthesizeFinalAnswer(
  question: string,
  stage1: readonly Stage1Result[],
  stage2: readonly RawRanking[],
  summary: RankingSummary,
  ctx: StageContext,
): Promise<Stage3Outcome> {
  const prompt = buildSynthesisPrompt(question, stage1, stage2, summary);
  log.debug(`stage3: synthesis prompt is ${prompt.length} chars`);
  return askChairman([{ role: 'user', content: prompt }], { timeoutMs: MEMBER_TIMEOUT_MS, signal: ctx.signal }, ctx);
}

/** Chairman answers the built context on its own; no ranking metadata. */
export async function runChairmanDirect(
  messages: readonly ChatMessage[],
  ctx: StageContext,
): Promise<Stage3Outcome> {
  return askChairman(
    [{ role: 'system', content: CHAIRMAN_DIRECT_SYSTEM_PROMPT }, ...messages],
    { webSearch: ctx.snapshot.webSearchEnabled, timeoutMs: MEMBER_TIMEOUT_MS, signal: ctx.signal },
    ctx,
  );
}
