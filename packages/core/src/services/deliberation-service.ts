import { randomUUID } from 'node:crypto';
import type { Conversation, ConversationSettings } from '../domain/conversation/conversation.js';
import { toChairmanTurnRecord, toCouncilTurnRecord } from '../domain/conversation/conversation.js';
import { generateConversationTitle } from '../domain/conversation/title.js';
import type { DeliberationMode, TurnResult } from '../domain/deliberation/deliberation.js';
import { runDeliberationTurn } from '../domain/deliberation/orchestrator.js';
import type { ConfigStore } from '../ports/config-store.js';
import type { ConversationStore } from '../ports/conversation-store.js';
import { noopEvents, type DeliberationEvents } from '../ports/deliberation-events.js';
import type { LlmGateway } from '../ports/llm-gateway.js';
import { EventStream, teeEvents } from '../adapters/event-stream.js';
import { ConfigService } from './config-service.js';
import { ConversationNotFoundError, HistoryUnavailableError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';

const log = createLogger('deliberation-service');

export interface TurnInput {
  conversationId: string;
  content: string;
  mode: DeliberationMode;
  /** Per-turn overrides, laid over the conversation's own settings. */
  overrides?: ConversationSettings;
  signal?: AbortSignal;
  events?: DeliberationEvents;
}

export interface TurnOutcome {
  conversationId: string;
  /** Set when this turn gave the conversation its title. */
  title: string | null;
  result: TurnResult;
}

export interface DeliberationDeps {
  llmGateway: LlmGateway;
  configStore: ConfigStore;
  conversationStore: ConversationStore;
  events?: DeliberationEvents;
  /** Environment the configuration is resolved against; defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

export class DeliberationService {
  private activeControllers = new Map<string, AbortController>();
  private configService: ConfigService;

  constructor(private deps: DeliberationDeps) {
    this.configService = new ConfigService(deps.configStore, deps.env);
  }

  async createConversation(settings?: ConversationSettings): Promise<Conversation> {
    return this.deps.conversationStore.create(randomUUID(), settings);
  }

  private async loadHistory(conversationId: string): Promise<Conversation> {
    let conversation: Conversation | null;
    try {
      conversation = await this.deps.conversationStore.get(conversationId);
    } catch (err) {
      throw new HistoryUnavailableError(conversationId, err);
    }
    if (!conversation) throw new ConversationNotFoundError(conversationId);
    return conversation;
  }

  async runTurn(input: TurnInput): Promise<TurnOutcome> {
    const { conversationId, content, mode } = input;
    const reported = { error: false };
    const events = teeEvents(
      this.deps.events ?? noopEvents,
      input.events ?? noopEvents,
      { ...noopEvents, onError: () => { reported.error = true; } },
    );

    const controller = new AbortController();
    const onCancel = () => controller.abort();
    if (input.signal?.aborted) controller.abort();
    else input.signal?.addEventListener('abort', onCancel, { once: true });
    this.activeControllers.set(conversationId, controller);

    try {
      const conversation = await this.loadHistory(conversationId);
      const snapshot = await this.configService.resolveSnapshot(conversation.settings, input.overrides);
      // A store may hand back its live message list; addUserMessage would append to it.
      const history = [...conversation.messages];
      const isFirstMessage = history.length === 0;
      log.info(`runTurn: ${conversationId} (${mode}), ${history.length} prior message(s)`);

      await this.deps.conversationStore.addUserMessage(conversationId, content);

      const titlePromise = isFirstMessage
        ? generateConversationTitle(content, {
            gateway: this.deps.llmGateway,
            model: snapshot.chairmanModel,
            signal: controller.signal,
          }).then((title) => {
            events.onTitle(title);
            return title;
          })
        : Promise.resolve(null);

      const [result, title] = await Promise.all([
        runDeliberationTurn({
          history,
          message: content,
          mode,
          snapshot,
          gateway: this.deps.llmGateway,
          events,
          signal: controller.signal,
        }),
        titlePromise,
      ]);

      if (title !== null) {
        await this.deps.conversationStore.updateTitle(conversationId, title);
      }
      if (result.mode === 'council') {
        await this.deps.conversationStore.addCouncilTurn(conversationId, toCouncilTurnRecord(result));
      } else {
        await this.deps.conversationStore.addChairmanTurn(conversationId, toChairmanTurnRecord(result));
      }
      log.info(`runTurn: ${conversationId} saved`);

      return { conversationId, title, result };
    } catch (err) {
      log.error(`runTurn: ${conversationId} failed:`, err instanceof Error ? err.message : err);
      if (!reported.error) events.onError(err instanceof Error ? err.message : 'Unknown error');
      throw err;
    } finally {
      input.signal?.removeEventListener('abort', onCancel);
      if (this.activeControllers.get(conversationId) === controller) {
        this.activeControllers.delete(conversationId);
      }
    }
  }

  /**
   * The same turn as an async stream of events. The stream ends after the
   * turn settles; a failed turn ends with an `error` event.
   */
  stream(input: Omit<TurnInput, 'events'>): EventStream {
    const stream = new EventStream();
    void this.runTurn({ ...input, events: stream })
      .catch((err: unknown) => {
        log.debug('stream: turn ended with an error, already delivered as an event', err);
      })
      .finally(() => stream.close());
    return stream;
  }

  cancel(conversationId: string): void {
    this.activeControllers.get(conversationId)?.abort();
  }

  cancelAll(): void {
    for (const [, controller] of this.activeControllers) {
      controller.abort();
    }
  }
}
