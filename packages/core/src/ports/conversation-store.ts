import type {
  ChairmanTurnRecord,
  Conversation,
  ConversationSettings,
  ConversationSummary,
  CouncilTurnRecord,
} from '../domain/conversation/conversation.js';

export interface ConversationStore {
  create(id: string, settings?: ConversationSettings): Promise<Conversation>;
  /** `null` when no conversation has this id. */
  get(id: string): Promise<Conversation | null>;
  list(): Promise<ConversationSummary[]>;
  addUserMessage(id: string, content: string): Promise<void>;
  addCouncilTurn(id: string, turn: CouncilTurnRecord): Promise<void>;
  addChairmanTurn(id: string, turn: ChairmanTurnRecord): Promise<void>;
  updateTitle(id: string, title: string): Promise<void>;
  updateSettings(id: string, settings: ConversationSettings): Promise<void>;
  delete(id: string): Promise<boolean>;
  deleteAll(): Promise<void>;
}
