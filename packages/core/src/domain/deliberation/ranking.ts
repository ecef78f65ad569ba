import type { RawRanking, ResponseLabel } from '../council/stage-results.js';
import type { AggregateRankingEntry, RankingSummary, TournamentRankingEntry } from './deliberation.js';
import { compareLabels } from './anonymize.js';

const MARKER = /FINAL RANKING:/gi;
const NUMBERED_ENTRY = /\d+\.\s*\**\s*[Rr]esponse\s+([A-Z]{1,3})\b/g;
const ANY_LABEL = /[Rr]esponse\s+([A-Z]{1,3})\b/g;

function uniqueCaptures(text: string, pattern: RegExp, known?: ReadonlySet<string>): ResponseLabel[] {
  const seen = new Set<ResponseLabel>();
  for (const match of text.matchAll(pattern)) {
    const label = match[1];
    if (label === undefined || seen.has(label)) continue;
    if (known && !known.has(label)) continue;
    seen.add(label);
  }
  return [...seen];
}

/**
 * Reads the ranking out of a reviewer's reply, best first.
 *
 * With a `FINAL RANKING:` marker, only the numbered list after the last marker
 * counts, and a marker without one yields `[]`. Without any marker, every
 * `Response X` mention is taken in order of first appearance. Never throws.
 */
export function parseRankingFromText(rankingText: string, knownLabels?: Iterable<ResponseLabel>): ResponseLabel[] {
  const known = knownLabels ? new Set(knownLabels) : undefined;

  let lastMarkerEnd = -1;
  for (const match of rankingText.matchAll(MARKER)) {
    lastMarkerEnd = (match.index ?? 0) + match[0].length;
  }

  if (lastMarkerEnd !== -1) {
    return uniqueCaptures(rankingText.slice(lastMarkerEnd), NUMBERED_ENTRY, known);
  }
  return uniqueCaptures(rankingText, ANY_LABEL, known);
}

/** Known labels only, first occurrence wins. */
function usableOrder(parsed: readonly ResponseLabel[], labelToModel: Record<ResponseLabel, string>): ResponseLabel[] {
  const seen = new Set<ResponseLabel>();
  for (const label of parsed) {
    if (Object.hasOwn(labelToModel, label)) seen.add(label);
  }
  return [...seen];
}

function modelFor(labelToModel: Record<ResponseLabel, string>, label: ResponseLabel): string {
  return labelToModel[label] ?? label;
}

export function calculateAggregateRankings(
  rankings: readonly RawRanking[],
  labelToModel: Record<ResponseLabel, string>,
): AggregateRankingEntry[] {
  const totals = new Map<ResponseLabel, { sum: number; count: number }>();

  for (const ranking of rankings) {
    usableOrder(ranking.parsedRanking, labelToModel).forEach((label, i) => {
      const entry = totals.get(label) ?? { sum: 0, count: 0 };
      entry.sum += i + 1;
      entry.count += 1;
      totals.set(label, entry);
    });
  }

  return [...totals.entries()]
    .map(([label, { sum, count }]) => ({ label, mean: sum / count, count }))
    .sort((a, b) => a.mean - b.mean || compareLabels(a.label, b.label))
    .map(({ label, mean, count }) => ({
      model: modelFor(labelToModel, label),
      label,
      averageRank: Math.round(mean * 100) / 100,
      rankingsCount: count,
    }));
}

/**
 * Pairwise (Copeland) tournament. For each pair of responses the reviewers'
 * preferences are tallied over every ranking that places both; the side with
 * more preferences wins that matchup. A single reviewer can therefore swing a
 * matchup by at most one vote.
 */
export function calculateTournamentRankings(
  rankings: readonly RawRanking[],
  labelToModel: Record<ResponseLabel, string>,
): TournamentRankingEntry[] {
  const preferred = new Map<string, number>();
  const appearances = new Map<ResponseLabel, number>();
  const key = (winner: ResponseLabel, loser: ResponseLabel) => `${winner}>${loser}`;

  for (const ranking of rankings) {
    const order = usableOrder(ranking.parsedRanking, labelToModel);
    for (const label of order) {
      appearances.set(label, (appearances.get(label) ?? 0) + 1);
    }
    for (let i = 0; i < order.length; i++) {
      for (let j = i + 1; j < order.length; j++) {
        const k = key(order[i], order[j]);
        preferred.set(k, (preferred.get(k) ?? 0) + 1);
      }
    }
  }

  const labels = [...appearances.keys()].sort(compareLabels);
  const stats = new Map(labels.map((label) => [label, { wins: 0, losses: 0, ties: 0 }]));

  for (let i = 0; i < labels.length; i++) {
    for (let j = i + 1; j < labels.length; j++) {
      const a = labels[i];
      const b = labels[j];
      const aOverB = preferred.get(key(a, b)) ?? 0;
      const bOverA = preferred.get(key(b, a)) ?? 0;
      if (aOverB + bOverA === 0) continue;

      const sa = stats.get(a);
      const sb = stats.get(b);
      if (!sa || !sb) continue;
      if (aOverB > bOverA) {
        sa.wins++;
        sb.losses++;
      } else if (bOverA > aOverB) {
        sb.wins++;
        sa.losses++;
      } else {
        sa.ties++;
        sb.ties++;
      }
    }
  }

  return labels
    .map((label) => {
      const { wins, losses, ties } = stats.get(label) ?? { wins: 0, losses: 0, ties: 0 };
      return {
        model: modelFor(labelToModel, label),
        label,
        wins,
        losses,
        ties,
        score: wins - losses,
        rankingsCount: appearances.get(label) ?? 0,
      };
    })
    .sort((a, b) => b.score - a.score || b.wins - a.wins || compareLabels(a.label, b.label));
}

export function summarizeRankings(
  rankings: readonly RawRanking[],
  labelToModel: Record<ResponseLabel, string>,
): RankingSummary {
  return {
    labelToModel: { ...labelToModel },
    aggregateRankings: calculateAggregateRankings(rankings, labelToModel),
    tournamentRankings: calculateTournamentRankings(rankings, labelToModel),
  };
}
