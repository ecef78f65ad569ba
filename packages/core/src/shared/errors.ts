export class SynodError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SynodError';
  }
}

export class ConfigError extends SynodError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** The conversation history could not be read; the turn cannot start. */
export class HistoryUnavailableError extends SynodError {
  constructor(public readonly conversationId: string, cause: unknown) {
    super(
      `Could not read history for conversation ${conversationId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'HISTORY_UNAVAILABLE',
      { cause },
    );
    this.name = 'HistoryUnavailableError';
  }
}

export class ConversationNotFoundError extends SynodError {
  constructor(public readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`, 'CONVERSATION_NOT_FOUND');
    this.name = 'ConversationNotFoundError';
  }
}

export class StorageError extends SynodError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_ERROR', options);
    this.name = 'StorageError';
  }
}

export class TurnCancelledError extends SynodError {
  constructor(public readonly phase: string) {
    super(`Turn cancelled during ${phase}`, 'TURN_CANCELLED');
    this.name = 'TurnCancelledError';
  }
}
