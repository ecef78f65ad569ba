import type {
  AggregateRankingEntry,
  CouncilTokenUsage,
  ModelQueryError,
  RankingSummary,
  StageNumber,
  TournamentRankingEntry,
  TurnResult,
} from '@synod/core';
import type { EventHandler } from '../adapters/callback-event-bridge.js';

export type MemberStatus = 'pending' | 'complete' | 'failed';

export interface MemberState {
  /** Position in the stage's fan-out; a model may sit on the council more than once. */
  slot: number;
  model: string;
  status: MemberStatus;
  error?: string;
  usage?: CouncilTokenUsage | null;
}

export interface DeliberationState {
  stage: number;
  stageSummary: string;
  /** Progress of the stage currently running, in fan-out order. */
  members: MemberState[];
  aggregateRankings: AggregateRankingEntry[];
  tournamentRankings: TournamentRankingEntry[];
  title: string | null;
  result: TurnResult | null;
  error: string | null;
  done: boolean;
}

export type Action =
  | { type: 'STAGE_START'; stage: StageNumber; models: readonly string[] }
  | { type: 'MEMBER_COMPLETE'; model: string; error: ModelQueryError | null }
  | { type: 'STAGE1_COMPLETE'; answered: number; failed: number }
  | { type: 'STAGE2_COMPLETE'; summary: RankingSummary }
  | { type: 'STAGE3_COMPLETE'; model: string; usage?: CouncilTokenUsage | null }
  | { type: 'TITLE'; title: string }
  | { type: 'COMPLETE'; result: TurnResult }
  | { type: 'ERROR'; error: string };

const STAGE_SUMMARIES: Record<StageNumber, string> = {
  1: 'Collecting answers from the council',
  2: 'Council members ranking anonymized answers',
  3: 'Chairman writing the final answer',
};

export function deliberationReducer(state: DeliberationState, action: Action): DeliberationState {
  switch (action.type) {
    case 'STAGE_START': {
      const members = action.models.map((model, slot): MemberState => ({ slot, model, status: 'pending' }));
      return { ...state, stage: action.stage, stageSummary: STAGE_SUMMARIES[action.stage], members };
    }

    case 'MEMBER_COMPLETE': {
      // Completions carry only the model id; the first pending slot for it takes the result.
      const slot = state.members.findIndex((m) => m.model === action.model && m.status === 'pending');
      if (slot === -1) return state;
      const members = [...state.members];
      members[slot] = {
        slot,
        model: action.model,
        status: action.error ? 'failed' : 'complete',
        error: action.error?.message,
      };
      return { ...state, members };
    }

    case 'STAGE1_COMPLETE':
      return { ...state, stageSummary: `${action.answered} answered, ${action.failed} failed` };

    case 'STAGE2_COMPLETE':
      return {
        ...state,
        aggregateRankings: action.summary.aggregateRankings,
        tournamentRankings: action.summary.tournamentRankings,
      };

    case 'STAGE3_COMPLETE': {
      const members = state.members.map((m) => (m.model === action.model ? { ...m, usage: action.usage } : m));
      return { ...state, members };
    }

    case 'TITLE':
      return { ...state, title: action.title };

    case 'COMPLETE':
      return { ...state, result: action.result, done: true };

    case 'ERROR':
      return { ...state, error: action.error, done: true };

    default:
      return state;
  }
}

export const initialState: DeliberationState = {
  stage: 0,
  stageSummary: '',
  members: [],
  aggregateRankings: [],
  tournamentRankings: [],
  title: null,
  result: null,
  error: null,
  done: false,
};

/** Event handlers that feed a reducer dispatch. */
export function handlersFor(dispatch: (action: Action) => void): EventHandler {
  return {
    onStageStart: (stage, models) => dispatch({ type: 'STAGE_START', stage, models }),
    onMemberComplete: (_stage, model, error) => dispatch({ type: 'MEMBER_COMPLETE', model, error }),
    onStage1Complete: (results, errors) =>
      dispatch({ type: 'STAGE1_COMPLETE', answered: results.length, failed: errors.length }),
    onStage2Complete: (_rankings, summary) => dispatch({ type: 'STAGE2_COMPLETE', summary }),
    onStage3Complete: (result) => dispatch({ type: 'STAGE3_COMPLETE', model: result.model, usage: result.usage }),
    onTitle: (title) => dispatch({ type: 'TITLE', title }),
    onComplete: (result) => dispatch({ type: 'COMPLETE', result }),
    onError: (error) => dispatch({ type: 'ERROR', error }),
  };
}
