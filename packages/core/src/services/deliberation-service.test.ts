import { describe, it, expect } from 'vitest';
import { DeliberationService } from './deliberation-service.js';
import type { DeliberationEvent } from '../adapters/event-stream.js';
import { ConversationNotFoundError, HistoryUnavailableError, TurnCancelledError } from '../shared/errors.js';
import { noopEvents } from '../ports/deliberation-events.js';
import {
  FakeGateway,
  InMemoryConversationStore,
  MemoryConfigStore,
  failed,
  scriptedGateway,
} from '../../test/fakes.js';

const ENV = { COUNCIL_MODELS: 'test/alpha,test/beta', CHAIRMAN_MODEL: 'test/chair', OPENROUTER_API_KEY: 'test-secret' };

function setup(gateway: FakeGateway = scriptedGateway()) {
  const conversationStore = new InMemoryConversationStore();
  const service = new DeliberationService({
    llmGateway: gateway,
    configStore: new MemoryConfigStore(),
    conversationStore,
    env: ENV,
  });
  return { service, conversationStore, gateway };
}

async function collect(stream: AsyncIterable<DeliberationEvent>): Promise<DeliberationEvent[]> {
  const events: DeliberationEvent[] = [];
  for await (const event of stream) events.push(event);
  return events;
}

describe('DeliberationService', () => {
  it('should run a council turn, title the conversation and store both messages', async () => {
    const { service, conversationStore, gateway } = setup(scriptedGateway({ title: '"Ocean Tides"' }));
    const titles: string[] = [];
    const conversation = await service.createConversation();

    const outcome = await service.runTurn({
      conversationId: conversation.id,
      content: 'Why are there tides?',
      mode: 'council',
      events: { ...noopEvents, onTitle: (title) => titles.push(title) },
    });

    expect(outcome.title).toBe('Ocean Tides');
    expect(titles).toEqual(['Ocean Tides']);
    expect(outcome.result.stage3.response).toBe('final answer');
    expect(gateway.callsOf('title')[0].model).toBe('test/chair');

    const stored = await conversationStore.get(conversation.id);
    expect(stored?.title).toBe('Ocean Tides');
    expect(stored?.messages.map((m) => (m.role === 'user' ? m.content : m.mode))).toEqual([
      'Why are there tides?',
      'council',
    ]);
  });

  it('should not title a conversation twice', async () => {
    const { service, gateway } = setup();
    const { id } = await service.createConversation();

    await service.runTurn({ conversationId: id, content: 'first', mode: 'council' });
    const second = await service.runTurn({ conversationId: id, content: 'second', mode: 'chairman' });

    expect(second.title).toBeNull();
    expect(second.result).toMatchObject({ mode: 'chairman', stage3: { response: 'direct answer' } });
    expect(gateway.callsOf('title')).toHaveLength(1);
  });

  it('should feed earlier answers back as context', async () => {
    const { service, gateway } = setup();
    const { id } = await service.createConversation();

    await service.runTurn({ conversationId: id, content: 'first', mode: 'council' });
    await service.runTurn({ conversationId: id, content: 'second', mode: 'chairman' });

    const [direct] = gateway.callsOf('direct');
    expect(direct.messages.slice(1)).toEqual([
      { role: 'user', content: 'first' },
      { role: 'assistant', content: 'final answer' },
      { role: 'user', content: 'second' },
    ]);
  });

  it('should finish and store the turn when the title call rejects', async () => {
    const scripted = scriptedGateway();
    const gateway = new FakeGateway((call) => {
      if (call.kind === 'title') throw new Error('connection reset');
      return scripted.query(call.model, call.messages, call.options);
    });
    const { service, conversationStore } = setup(gateway);
    const { id } = await service.createConversation();

    const outcome = await service.runTurn({ conversationId: id, content: 'q', mode: 'council' });

    expect(outcome.title).toBe('New Conversation');
    expect(outcome.result.stage3.response).toBe('final answer');
    expect(conversationStore.conversations.get(id)?.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
  });

  it('should use the conversation settings over the global council', async () => {
    const { service, gateway } = setup();
    const { id } = await service.createConversation({ councilModels: ['conv/only'], chairmanModel: 'conv/chair' });

    await service.runTurn({ conversationId: id, content: 'q', mode: 'council' });

    expect(gateway.callsOf('answer').map((c) => c.model)).toEqual(['conv/only']);
    expect(gateway.callsOf('synthesis')[0].model).toBe('conv/chair');
  });

  it('should stop before any model call when the conversation does not exist', async () => {
    const { service, gateway } = setup();
    const errors: string[] = [];

    await expect(
      service.runTurn({
        conversationId: 'nope',
        content: 'q',
        mode: 'council',
        events: { ...noopEvents, onError: (message) => errors.push(message) },
      }),
    ).rejects.toBeInstanceOf(ConversationNotFoundError);

    expect(errors).toEqual(['Conversation not found: nope']);
    expect(gateway.calls).toHaveLength(0);
  });

  it('should treat an unreadable history as fatal', async () => {
    const { service, conversationStore, gateway } = setup();
    const { id } = await service.createConversation();
    conversationStore.failReads = true;

    await expect(service.runTurn({ conversationId: id, content: 'q', mode: 'council' })).rejects.toBeInstanceOf(
      HistoryUnavailableError,
    );
    expect(gateway.calls).toHaveLength(0);
  });

  it('should not store an answer for a cancelled turn', async () => {
    let service: DeliberationService | undefined;
    let conversationId = '';
    const gateway = new FakeGateway(({ model, kind }) => {
      if (kind === 'answer') service?.cancel(conversationId);
      return failed(model, 'unknown', 'Request cancelled.');
    });
    const context = setup(gateway);
    service = context.service;
    conversationId = (await service.createConversation()).id;
    await context.conversationStore.addUserMessage(conversationId, 'earlier');

    await expect(service.runTurn({ conversationId, content: 'q', mode: 'council' })).rejects.toBeInstanceOf(
      TurnCancelledError,
    );

    const stored = await context.conversationStore.get(conversationId);
    expect(stored?.messages.map((m) => m.role)).toEqual(['user', 'user']);
  });

  it('should stream the events of a turn', async () => {
    const { service } = setup();
    const { id } = await service.createConversation();
    await service.runTurn({ conversationId: id, content: 'first', mode: 'council' });

    const events = await collect(service.stream({ conversationId: id, content: 'second', mode: 'chairman' }));

    expect(events.map((e) => e.type)).toEqual(['stage3_start', 'member_complete', 'stage3_complete', 'complete']);
  });

  it('should end the stream with an error event when the turn fails', async () => {
    const { service } = setup();
    const events = await collect(service.stream({ conversationId: 'nope', content: 'q', mode: 'council' }));
    expect(events).toEqual([{ type: 'error', message: 'Conversation not found: nope' }]);
  });
});
