import { describe, it, expect } from 'vitest';
import type { RawRanking } from '../council/stage-results.js';
import {
  calculateAggregateRankings,
  calculateTournamentRankings,
  parseRankingFromText,
  summarizeRankings,
} from './ranking.js';

function ranking(model: string, parsedRanking: string[]): RawRanking {
  return { model, rankingText: '', parsedRanking };
}

const FOUR = { A: 'model-a', B: 'model-b', C: 'model-c', D: 'model-d' };

describe('parseRankingFromText', () => {
  it('should read the numbered list after the marker', () => {
    expect(parseRankingFromText('FINAL RANKING:\n1. Response C\n2. Response A\n3. Response B')).toEqual(['C', 'A', 'B']);
  });

  it('should return empty for text with no marker and no labels', () => {
    expect(parseRankingFromText('I cannot decide between these.')).toEqual([]);
    expect(parseRankingFromText('')).toEqual([]);
  });

  it('should return empty when the marker has no numbered list', () => {
    expect(parseRankingFromText('Response A is weak.\n\nFINAL RANKING:\nResponse B is best')).toEqual([]);
  });

  it('should fall back to label mentions in order of first appearance', () => {
    const text = 'Response B is more thorough than Response A. Response B also cites sources.';
    expect(parseRankingFromText(text)).toEqual(['B', 'A']);
  });

  it('should use the last marker when there are several', () => {
    const text = [
      'FINAL RANKING:',
      '1. Response A',
      '2. Response B',
      '',
      'On reflection:',
      'FINAL RANKING:',
      '1. Response B',
      '2. Response A',
    ].join('\n');
    expect(parseRankingFromText(text)).toEqual(['B', 'A']);
  });

  it('should accept bold entries and a lowercase marker', () => {
    expect(parseRankingFromText('final ranking:\n1. **Response B**\n2. **Response A**')).toEqual(['B', 'A']);
  });

  it('should drop duplicates and unknown labels', () => {
    const text = 'FINAL RANKING:\n1. Response D\n2. Response A\n3. Response A\n4. Response B';
    expect(parseRankingFromText(text, ['A', 'B'])).toEqual(['A', 'B']);
  });

  it('should read multi-letter labels', () => {
    expect(parseRankingFromText('FINAL RANKING:\n1. Response AA\n2. Response Z')).toEqual(['AA', 'Z']);
  });
});

describe('calculateAggregateRankings', () => {
  it('should give exactly p to a label ranked p in every ranking', () => {
    const rankings = [ranking('r1', ['B', 'A']), ranking('r2', ['B', 'A']), ranking('r3', ['B', 'A'])];
    expect(calculateAggregateRankings(rankings, { A: 'model-a', B: 'model-b' })).toEqual([
      { model: 'model-b', label: 'B', averageRank: 1, rankingsCount: 3 },
      { model: 'model-a', label: 'A', averageRank: 2, rankingsCount: 3 },
    ]);
  });

  it('should not penalise a label missing from a ranking', () => {
    const rankings = [ranking('r1', ['A', 'B', 'C']), ranking('r2', ['C'])];
    const result = calculateAggregateRankings(rankings, { A: 'model-a', B: 'model-b', C: 'model-c' });
    expect(result.map((r) => [r.label, r.averageRank, r.rankingsCount])).toEqual([
      ['A', 1, 1],
      ['B', 2, 1],
      ['C', 2, 2],
    ]);
  });

  it('should skip labels the map does not know', () => {
    const result = calculateAggregateRankings([ranking('r1', ['Z', 'A', 'B'])], { A: 'model-a', B: 'model-b' });
    expect(result.map((r) => [r.model, r.averageRank])).toEqual([
      ['model-a', 1],
      ['model-b', 2],
    ]);
  });

  it('should return empty when no ranking was parsed', () => {
    expect(calculateAggregateRankings([ranking('r1', [])], FOUR)).toEqual([]);
  });
});

describe('calculateTournamentRankings', () => {
  it('should score head-to-head matchups', () => {
    const rankings = [ranking('r1', ['A', 'B', 'C']), ranking('r2', ['A', 'C', 'B'])];
    expect(calculateTournamentRankings(rankings, { A: 'model-a', B: 'model-b', C: 'model-c' })).toEqual([
      { model: 'model-a', label: 'A', wins: 2, losses: 0, ties: 0, score: 2, rankingsCount: 2 },
      { model: 'model-b', label: 'B', wins: 0, losses: 1, ties: 1, score: -1, rankingsCount: 2 },
      { model: 'model-c', label: 'C', wins: 0, losses: 1, ties: 1, score: -1, rankingsCount: 2 },
    ]);
  });

  it('should be invariant to the order rankings arrive in', () => {
    const rankings = [
      ranking('r1', ['A', 'B', 'C', 'D']),
      ranking('r2', ['C', 'A', 'D', 'B']),
      ranking('r3', ['B', 'D', 'A']),
      ranking('r4', ['D', 'C']),
    ];
    const forward = calculateTournamentRankings(rankings, FOUR);
    const backward = calculateTournamentRankings([...rankings].reverse(), FOUR);
    const shuffled = calculateTournamentRankings([rankings[2], rankings[0], rankings[3], rankings[1]], FOUR);
    expect(backward).toEqual(forward);
    expect(shuffled).toEqual(forward);
  });

  it('should record a split matchup as a tie for both sides', () => {
    const rankings = [ranking('r1', ['A', 'B']), ranking('r2', ['B', 'A'])];
    const result = calculateTournamentRankings(rankings, { A: 'model-a', B: 'model-b' });
    expect(result.map((r) => [r.label, r.wins, r.losses, r.ties, r.score])).toEqual([
      ['A', 0, 0, 1, 0],
      ['B', 0, 0, 1, 0],
    ]);
  });

  it('should follow the majority where a single outlier moves the mean', () => {
    const rankings = [
      ranking('r1', ['A', 'B', 'C', 'D']),
      ranking('r2', ['A', 'B', 'C', 'D']),
      ranking('r3', ['B', 'C', 'D', 'A']),
    ];

    const mean = calculateAggregateRankings(rankings, FOUR);
    expect(mean.map((r) => r.label)).toEqual(['B', 'A', 'C', 'D']);
    expect(mean[0].averageRank).toBe(1.67);
    expect(mean[1].averageRank).toBe(2);

    const tournament = calculateTournamentRankings(rankings, FOUR);
    expect(tournament.map((r) => [r.label, r.score])).toEqual([
      ['A', 3],
      ['B', 1],
      ['C', -1],
      ['D', -3],
    ]);
  });
});

describe('summarizeRankings', () => {
  it('should compute both orderings over the same map', () => {
    const summary = summarizeRankings([ranking('r1', ['B', 'A'])], { A: 'model-a', B: 'model-b' });
    expect(summary.labelToModel).toEqual({ A: 'model-a', B: 'model-b' });
    expect(summary.aggregateRankings.map((r) => r.model)).toEqual(['model-b', 'model-a']);
    expect(summary.tournamentRankings.map((r) => r.model)).toEqual(['model-b', 'model-a']);
  });
});
