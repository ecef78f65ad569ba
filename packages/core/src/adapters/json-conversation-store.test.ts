import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { JsonConversationStore } from './json-conversation-store.js';
import type { CouncilTurnRecord } from '../domain/conversation/conversation.js';
import { ConversationNotFoundError, StorageError } from '../shared/errors.js';

const TURN: CouncilTurnRecord = {
  stage1: [{ model: 'test/alpha', content: 'The moon.', usage: null }],
  stage2: [{ model: 'test/alpha', rankingText: 'FINAL RANKING:\n1. Response A', parsedRanking: ['A'] }],
  stage3: { model: 'test/chair', response: 'Mostly the moon.' },
  labelToModel: { A: 'test/alpha' },
  aggregateRankings: [{ model: 'test/alpha', label: 'A', averageRank: 1, rankingsCount: 1 }],
  tournamentRankings: [{ model: 'test/alpha', label: 'A', wins: 0, losses: 0, ties: 0, score: 0, rankingsCount: 1 }],
  errors: {
    stage1: [{ model: 'test/beta', kind: 'timeout', message: 'Request timed out after 120s.' }],
    stage2: [],
    stage3: [],
  },
};

describe('JsonConversationStore', () => {
  let dir: string;
  let store: JsonConversationStore;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'synod-store-'));
    store = new JsonConversationStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should create and read back a conversation', async () => {
    const created = await store.create('conv-1', { chairmanModel: 'test/chair' });
    expect(created.title).toBe('New Conversation');
    expect(created.messages).toEqual([]);

    expect(await store.get('conv-1')).toEqual(created);
  });

  it('should return null for an unknown id', async () => {
    expect(await store.get('missing')).toBeNull();
  });

  it('should append turns in order', async () => {
    await store.create('conv-1');
    await store.addUserMessage('conv-1', 'Why are there tides?');
    await store.addCouncilTurn('conv-1', TURN);
    await store.addUserMessage('conv-1', 'And the sun?');
    await store.addChairmanTurn('conv-1', { stage3: { model: 'test/chair', response: 'A little.' }, errors: { stage3: [] } });

    const conversation = await store.get('conv-1');
    expect(conversation?.messages.map((m) => (m.role === 'user' ? 'user' : m.mode))).toEqual([
      'user',
      'council',
      'user',
      'chairman',
    ]);
    const council = conversation?.messages[1];
    expect(council?.role === 'assistant' && council.mode === 'council' ? council.errors.stage1 : null).toEqual(
      TURN.errors.stage1,
    );
  });

  it('should update the title and merge settings', async () => {
    await store.create('conv-1', { chairmanModel: 'test/chair' });
    await store.updateTitle('conv-1', 'Ocean Tides');
    await store.updateSettings('conv-1', { webSearchEnabled: true });

    const conversation = await store.get('conv-1');
    expect(conversation?.title).toBe('Ocean Tides');
    expect(conversation?.settings).toEqual({ chairmanModel: 'test/chair', webSearchEnabled: true });
  });

  it('should refuse to update a conversation that does not exist', async () => {
    await expect(store.addUserMessage('missing', 'hi')).rejects.toBeInstanceOf(ConversationNotFoundError);
  });

  it('should list conversations newest first', async () => {
    await mkdir(store.conversationsDir, { recursive: true });
    for (const [id, createdAt] of [
      ['older', '2026-01-01T00:00:00.000Z'],
      ['newer', '2026-02-01T00:00:00.000Z'],
    ]) {
      await writeFile(
        join(store.conversationsDir, `${id}.json`),
        JSON.stringify({ id, createdAt, title: id, messages: [] }),
        'utf-8',
      );
    }

    expect(await store.list()).toEqual([
      { id: 'newer', createdAt: '2026-02-01T00:00:00.000Z', title: 'newer', messageCount: 0 },
      { id: 'older', createdAt: '2026-01-01T00:00:00.000Z', title: 'older', messageCount: 0 },
    ]);
  });

  it('should skip unreadable files when listing but fail when reading one', async () => {
    await store.create('good');
    await writeFile(join(store.conversationsDir, 'broken.json'), '{ not json', 'utf-8');

    expect((await store.list()).map((c) => c.id)).toEqual(['good']);
    await expect(store.get('broken')).rejects.toBeInstanceOf(StorageError);
  });

  it('should reject ids that could escape the directory', async () => {
    await expect(store.get('../secrets')).rejects.toThrow('Invalid conversation id');
    await expect(store.create('a/b')).rejects.toBeInstanceOf(StorageError);
  });

  it('should delete one or all conversations', async () => {
    await store.create('one');
    await store.create('two');

    expect(await store.delete('one')).toBe(true);
    expect(await store.delete('one')).toBe(false);
    expect((await store.list()).map((c) => c.id)).toEqual(['two']);

    await store.deleteAll();
    expect(await store.list()).toEqual([]);
  });

  it('should write plain JSON', async () => {
    await store.create('conv-1');
    const raw = JSON.parse(await readFile(join(store.conversationsDir, 'conv-1.json'), 'utf-8'));
    expect(raw.id).toBe('conv-1');
  });
});
