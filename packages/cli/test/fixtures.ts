import type { ChairmanTurnResult, CouncilTurnResult, TurnOutcome } from '@synod/core';

export const councilResult: CouncilTurnResult = {
  mode: 'council',
  stage1: [
    { model: 'test/alpha', content: 'alpha answer' },
    { model: 'test/beta', content: 'beta answer' },
  ],
  stage1Errors: [],
  stage2: [
    { model: 'test/alpha', rankingText: 'FINAL RANKING:\n1. Response A\n2. Response B', parsedRanking: ['A', 'B'] },
    { model: 'test/beta', rankingText: 'FINAL RANKING:\n1. Response A\n2. Response B', parsedRanking: ['A', 'B'] },
  ],
  stage2Errors: [{ model: 'test/gamma', kind: 'timeout', message: 'Request timed out after 120s.' }],
  stage3: { model: 'test/chair', response: 'The answer.' },
  stage3Errors: [],
  labelToModel: { A: 'test/alpha', B: 'test/beta' },
  aggregateRankings: [
    { model: 'test/alpha', label: 'A', averageRank: 1, rankingsCount: 2 },
    { model: 'test/beta', label: 'B', averageRank: 2, rankingsCount: 2 },
  ],
  tournamentRankings: [
    { model: 'test/alpha', label: 'A', wins: 1, losses: 0, ties: 0, score: 1, rankingsCount: 2 },
    { model: 'test/beta', label: 'B', wins: 0, losses: 1, ties: 0, score: -1, rankingsCount: 2 },
  ],
};

export const failedChairmanResult: ChairmanTurnResult = {
  mode: 'chairman',
  stage3: { model: 'test/chair', response: null },
  stage3Errors: [
    { model: 'test/chair', kind: 'rate_limit', message: 'Rate limit exceeded. Wait before retrying.', statusCode: 429 },
  ],
};

export function outcomeOf(result: CouncilTurnResult | ChairmanTurnResult, title: string | null = 'Ocean Tides'): TurnOutcome {
  return { conversationId: 'conv-1', title, result };
}
