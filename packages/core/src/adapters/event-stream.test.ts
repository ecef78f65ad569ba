import { describe, it, expect } from 'vitest';
import { EventStream, teeEvents, type DeliberationEvent } from './event-stream.js';
import { noopEvents } from '../ports/deliberation-events.js';

describe('EventStream', () => {
  it('should deliver events pushed before and after iteration starts', async () => {
    const stream = new EventStream();
    stream.onStageStart(1, ['test/alpha']);

    const seen: DeliberationEvent[] = [];
    const consumer = (async () => {
      for await (const event of stream) seen.push(event);
    })();

    await Promise.resolve();
    stream.onTitle('Ocean Tides');
    stream.onError('boom');
    stream.close();
    stream.onTitle('ignored after close');
    await consumer;

    expect(seen).toEqual([
      { type: 'stage1_start', models: ['test/alpha'] },
      { type: 'title', title: 'Ocean Tides' },
      { type: 'error', message: 'boom' },
    ]);
  });

  it('should name start events by stage', async () => {
    const stream = new EventStream();
    stream.onStageStart(2, ['a']);
    stream.onStageStart(3, ['chair']);
    stream.close();

    const types: string[] = [];
    for await (const event of stream) types.push(event.type);
    expect(types).toEqual(['stage2_start', 'stage3_start']);
  });
});

describe('teeEvents', () => {
  it('should forward to every target', () => {
    const titles: string[] = [];
    const events = teeEvents(
      { ...noopEvents, onTitle: (t) => titles.push(`first:${t}`) },
      { ...noopEvents, onTitle: (t) => titles.push(`second:${t}`) },
    );
    events.onTitle('x');
    expect(titles).toEqual(['first:x', 'second:x']);
  });
});
