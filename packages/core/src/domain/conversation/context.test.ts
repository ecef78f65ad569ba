import { describe, it, expect } from 'vitest';
import type { StoredMessage } from './conversation.js';
import {
  buildContextMessages,
  groupExchanges,
  MAX_SUMMARY_CHARS,
  renderTranscript,
  SUMMARY_PREFIX,
  SUMMARY_TIMEOUT_MS,
  toChatMessages,
  TRUNCATION_PREFIX,
} from './context.js';
import { FakeGateway, failed, ok } from '../../../test/fakes.js';

const AT = '2026-01-01T00:00:00.000Z';

function user(content: string): StoredMessage {
  return { role: 'user', content, createdAt: AT };
}

function chairman(response: string | null): StoredMessage {
  return {
    role: 'assistant',
    mode: 'chairman',
    createdAt: AT,
    stage3: { model: 'chair', response },
    errors: { stage3: [] },
  };
}

function council(response: string): StoredMessage {
  return {
    role: 'assistant',
    mode: 'council',
    createdAt: AT,
    stage1: [{ model: 'm1', content: 'stage one detail' }],
    stage2: [{ model: 'm1', rankingText: 'FINAL RANKING:\n1. Response A', parsedRanking: ['A'] }],
    stage3: { model: 'chair', response },
    labelToModel: { A: 'm1' },
    aggregateRankings: [],
    tournamentRankings: [],
    errors: { stage1: [], stage2: [], stage3: [] },
  };
}

function exchanges(count: number): StoredMessage[] {
  return Array.from({ length: count }, (_, i) => [user(`question ${i + 1}`), council(`answer ${i + 1}`)]).flat();
}

describe('groupExchanges', () => {
  it('should start an exchange at each user message', () => {
    const groups = groupExchanges([user('q1'), council('a1'), user('q2'), user('q3'), chairman('a3')]);
    expect(groups.map((g) => g.length)).toEqual([2, 1, 2]);
  });
});

describe('toChatMessages', () => {
  it('should keep only the final answer of assistant turns', () => {
    expect(toChatMessages([user('q1'), council('a1'), user('q2'), chairman(null), user('q3'), chairman('  ')])).toEqual([
      { role: 'user', content: 'q1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'q2' },
      { role: 'user', content: 'q3' },
    ]);
  });
});

describe('renderTranscript', () => {
  it('should keep the newest text when over the cap', () => {
    const long = 'x'.repeat(MAX_SUMMARY_CHARS);
    const text = renderTranscript([
      { role: 'user', content: 'oldest' },
      { role: 'assistant', content: long },
    ]);
    expect(text.startsWith(TRUNCATION_PREFIX)).toBe(true);
    expect(text).toHaveLength(TRUNCATION_PREFIX.length + MAX_SUMMARY_CHARS);
    expect(text.endsWith('x')).toBe(true);
    expect(text).not.toContain('oldest');
  });
});

describe('buildContextMessages', () => {
  it('should pass short histories through verbatim without a model call', async () => {
    const gateway = new FakeGateway(({ model }) => ok(model, 'unused'));
    const messages = await buildContextMessages(exchanges(5), 'next', { gateway, summaryModel: 'chair' });

    expect(messages).toHaveLength(11);
    expect(messages[0]).toEqual({ role: 'user', content: 'question 1' });
    expect(messages[9]).toEqual({ role: 'assistant', content: 'answer 5' });
    expect(messages[10]).toEqual({ role: 'user', content: 'next' });
    expect(gateway.calls).toHaveLength(0);
  });

  it('should fold all but the last five exchanges into one summary', async () => {
    const gateway = new FakeGateway(({ model }) => ok(model, '  The user asked about tides.  '));
    const messages = await buildContextMessages(exchanges(12), 'next', { gateway, summaryModel: 'chair' });

    expect(messages).toHaveLength(12);
    expect(messages[0]).toEqual({ role: 'system', content: `${SUMMARY_PREFIX}The user asked about tides.` });
    expect(messages.filter((m) => m.role === 'system')).toHaveLength(1);
    expect(messages[1]).toEqual({ role: 'user', content: 'question 8' });
    expect(messages[10]).toEqual({ role: 'assistant', content: 'answer 12' });
    expect(messages[11]).toEqual({ role: 'user', content: 'next' });

    expect(gateway.calls).toHaveLength(1);
    const [call] = gateway.calls;
    expect(call.model).toBe('chair');
    expect(call.kind).toBe('summary');
    expect(call.options.timeoutMs).toBe(SUMMARY_TIMEOUT_MS);
    expect(call.messages[0].content).toContain('User: question 7');
    expect(call.messages[0].content).not.toContain('question 8');
    expect(call.messages[0].content).not.toContain('stage one detail');
  });

  it('should fall back to recent exchanges when summarizing fails', async () => {
    const gateway = new FakeGateway(({ model }) => failed(model, 'server'));
    const messages = await buildContextMessages(exchanges(7), 'next', { gateway, summaryModel: 'chair' });

    expect(messages).toHaveLength(11);
    expect(messages[0]).toEqual({ role: 'user', content: 'question 3' });
    expect(messages.some((m) => m.role === 'system')).toBe(false);
  });

  it('should fall back to recent exchanges when the summary call rejects', async () => {
    const gateway = new FakeGateway(() => {
      throw new Error('connection reset');
    });
    const messages = await buildContextMessages(exchanges(7), 'next', { gateway, summaryModel: 'chair' });

    expect(messages).toHaveLength(11);
    expect(messages[0]).toEqual({ role: 'user', content: 'question 3' });
    expect(messages[10]).toEqual({ role: 'user', content: 'next' });
  });

  it('should drop an empty summary', async () => {
    const gateway = new FakeGateway(({ model }) => ok(model, '   '));
    const messages = await buildContextMessages(exchanges(6), 'next', { gateway, summaryModel: 'chair' });

    expect(messages).toHaveLength(11);
    expect(messages[0]).toEqual({ role: 'user', content: 'question 2' });
  });
});
