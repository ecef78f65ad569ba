import type { ModelQueryError } from '../council/model-error.js';
import type { RawRanking, ResponseLabel, Stage1Result, Stage3Result } from '../council/stage-results.js';
import type {
  AggregateRankingEntry,
  ChairmanTurnResult,
  CouncilTurnResult,
  TournamentRankingEntry,
} from '../deliberation/deliberation.js';

export const DEFAULT_CONVERSATION_TITLE = 'New Conversation';

export interface UserMessage {
  role: 'user';
  content: string;
  createdAt: string;
}

/** What gets stored for a full council turn. Errors are kept for display only. */
export interface CouncilTurnRecord {
  stage1: Stage1Result[];
  stage2: RawRanking[];
  stage3: Stage3Result;
  labelToModel: Record<ResponseLabel, string>;
  aggregateRankings: AggregateRankingEntry[];
  tournamentRankings: TournamentRankingEntry[];
  errors: {
    stage1: ModelQueryError[];
    stage2: ModelQueryError[];
    stage3: ModelQueryError[];
  };
}

export interface ChairmanTurnRecord {
  stage3: Stage3Result;
  errors: { stage3: ModelQueryError[] };
}

export interface AssistantCouncilMessage extends CouncilTurnRecord {
  role: 'assistant';
  mode: 'council';
  createdAt: string;
}

export interface AssistantChairmanMessage extends ChairmanTurnRecord {
  role: 'assistant';
  mode: 'chairman';
  createdAt: string;
}

export type AssistantMessage = AssistantCouncilMessage | AssistantChairmanMessage;
export type StoredMessage = UserMessage | AssistantMessage;

/** Per-conversation overrides laid over the global council configuration. */
export interface ConversationSettings {
  councilModels?: string[];
  chairmanModel?: string;
  webSearchEnabled?: boolean;
}

export interface Conversation {
  id: string;
  createdAt: string;
  title: string;
  settings?: ConversationSettings;
  messages: StoredMessage[];
}

export interface ConversationSummary {
  id: string;
  createdAt: string;
  title: string;
  messageCount: number;
}

export function toCouncilTurnRecord(result: CouncilTurnResult): CouncilTurnRecord {
  return {
    stage1: result.stage1,
    stage2: result.stage2,
    stage3: result.stage3,
    labelToModel: result.labelToModel,
    aggregateRankings: result.aggregateRankings,
    tournamentRankings: result.tournamentRankings,
    errors: {
      stage1: result.stage1Errors,
      stage2: result.stage2Errors,
      stage3: result.stage3Errors,
    },
  };
}

export function toChairmanTurnRecord(result: ChairmanTurnResult): ChairmanTurnRecord {
  return { stage3: result.stage3, errors: { stage3: result.stage3Errors } };
}

/** The synthesized answer, or `null` when the chairman produced none. */
export function finalAnswerOf(message: AssistantMessage): string | null {
  const response = message.stage3.response;
  return response && response.trim() ? response : null;
}

export function summarizeConversation(conversation: Conversation): ConversationSummary {
  return {
    id: conversation.id,
    createdAt: conversation.createdAt,
    title: conversation.title,
    messageCount: conversation.messages.length,
  };
}
