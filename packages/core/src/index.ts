// Domain types
export type { CouncilConfig, CouncilSnapshot } from './domain/council/council-config.js';
export {
  DEFAULT_COUNCIL_MODELS,
  DEFAULT_CHAIRMAN_MODEL,
  OPENROUTER_API_URL,
  applyOnlineVariant,
  snapshotCouncil,
} from './domain/council/council-config.js';
export type { ModelErrorKind, ModelQueryError } from './domain/council/model-error.js';
export { createModelQueryError, classifyHttpFailure, kindForStatus, summarizeErrors } from './domain/council/model-error.js';
export { queryModel } from './domain/council/query-model.js';
export type {
  Stage1Result,
  RawRanking,
  Stage3Result,
  AnonymizedResponse,
  ResponseLabel,
  CouncilTokenUsage,
  StageOutcome,
} from './domain/council/stage-results.js';

export type {
  DeliberationMode,
  TurnPhase,
  AggregateRankingEntry,
  TournamentRankingEntry,
  RankingSummary,
  CouncilTurnResult,
  ChairmanTurnResult,
  TurnResult,
} from './domain/deliberation/deliberation.js';
export { allTurnErrors } from './domain/deliberation/deliberation.js';
export { indexToLabel, labelToIndex, formatLabel, anonymizeResponses } from './domain/deliberation/anonymize.js';
export {
  parseRankingFromText,
  calculateAggregateRankings,
  calculateTournamentRankings,
  summarizeRankings,
} from './domain/deliberation/ranking.js';
export { buildRankingPrompt, buildSynthesisPrompt } from './domain/deliberation/prompts.js';
export {
  MEMBER_TIMEOUT_MS,
  collectStage1Responses,
  collectStage2Rankings,
  synthesizeFinalAnswer,
  runChairmanDirect,
} from './domain/deliberation/stages.js';
export type { StageContext } from './domain/deliberation/stages.js';
export { runDeliberationTurn } from './domain/deliberation/orchestrator.js';
export type { DeliberationTurnInput } from './domain/deliberation/orchestrator.js';

export type {
  UserMessage,
  AssistantMessage,
  AssistantCouncilMessage,
  AssistantChairmanMessage,
  StoredMessage,
  CouncilTurnRecord,
  ChairmanTurnRecord,
  Conversation,
  ConversationSettings,
  ConversationSummary,
} from './domain/conversation/conversation.js';
export { DEFAULT_CONVERSATION_TITLE, finalAnswerOf } from './domain/conversation/conversation.js';
export { buildContextMessages, RECENT_EXCHANGES } from './domain/conversation/context.js';
export { generateConversationTitle } from './domain/conversation/title.js';

// Port interfaces
export type { LlmGateway, LlmResponse, LlmQueryOptions, ChatMessage, ChatRole } from './ports/llm-gateway.js';
export type { ConversationStore } from './ports/conversation-store.js';
export type { ConfigStore, CouncilConfigPrefs } from './ports/config-store.js';
export type { DeliberationEvents, StageNumber } from './ports/deliberation-events.js';
export { noopEvents } from './ports/deliberation-events.js';

// Adapters
export { OpenRouterGateway } from './adapters/openrouter-gateway.js';
export type { OpenRouterGatewayOptions } from './adapters/openrouter-gateway.js';
export { JsonConversationStore } from './adapters/json-conversation-store.js';
export { JsonConfigStore } from './adapters/json-config-store.js';
export { EventStream, teeEvents } from './adapters/event-stream.js';
export type { DeliberationEvent } from './adapters/event-stream.js';

// Application services
export { DeliberationService } from './services/deliberation-service.js';
export type { TurnInput, TurnOutcome, DeliberationDeps } from './services/deliberation-service.js';
export { ConfigService, parseModelList } from './services/config-service.js';

// Shared
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './shared/logger.js';
export type { Logger, LogLevel } from './shared/logger.js';
export {
  SynodError,
  ConfigError,
  HistoryUnavailableError,
  ConversationNotFoundError,
  StorageError,
  TurnCancelledError,
} from './shared/errors.js';
