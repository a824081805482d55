/**
 * Cross-evaluator reductions over one stage's parsed results.
 *
 * Only parsed structures are read, never raw text. A label nobody scored
 * keeps null averages and sits after the ordered entries.
 */

import type { Anonymizer } from './anonymizer.js';
import {
  RATINGS,
  type AggregateFactCheck,
  type AggregateRanking,
  type FactCheckResult,
  type Rating,
  type RankingResult,
} from './types.js';

export const RATING_SCORES: Record<Rating, number> = {
  ACCURATE: 5,
  MOSTLY_ACCURATE: 4,
  MIXED: 3,
  MOSTLY_INACCURATE: 2,
  INACCURATE: 1,
};

export function ratingScore(rating: Rating): number {
  return RATING_SCORES[rating];
}

/** Nearest ordinal; halves round up (4.5 → ACCURATE). */
export function ratingFromScore(score: number): Rating {
  const ordinal = Math.min(5, Math.max(1, Math.round(score)));
  return RATINGS[5 - ordinal];
}

/** MOSTLY_ACCURATE → "MOSTLY ACCURATE"; null → "no data" */
export function ratingLabel(rating: Rating | null): string {
  return rating ? rating.replace(/_/g, ' ') : 'no data';
}

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

// --- Consensus rating ---

export function aggregateFactChecks(
  results: ReadonlyArray<Pick<FactCheckResult, 'ratings' | 'mostReliable'>>,
  anonymizer: Anonymizer,
): AggregateFactCheck[] {
  const labels = anonymizer.labels();
  const ratings = new Map<string, Rating[]>(labels.map((l) => [l, []]));
  const votes = new Map<string, number>();

  for (const result of results) {
    for (const [label, rating] of Object.entries(result.ratings)) {
      ratings.get(label)?.push(rating);
    }
    const vote = result.mostReliable;
    if (vote && anonymizer.has(vote)) {
      votes.set(vote, (votes.get(vote) ?? 0) + 1);
    }
  }

  const scored: Array<{ entry: AggregateFactCheck; average: number; order: number }> = [];
  const noData: AggregateFactCheck[] = [];

  labels.forEach((label, order) => {
    const ref = anonymizer.resolve(label);
    if (!ref) return;
    const breakdown = ratings.get(label) ?? [];
    const mostReliableVotes = votes.get(label) ?? 0;
    if (breakdown.length === 0) {
      noData.push({
        label,
        ...ref,
        consensusRating: null,
        averageScore: null,
        ratingCount: 0,
        mostReliableVotes,
        ratingBreakdown: [],
      });
      return;
    }
    const average = mean(breakdown.map(ratingScore));
    scored.push({
      average,
      order,
      entry: {
        label,
        ...ref,
        consensusRating: ratingFromScore(average),
        averageScore: round2(average),
        ratingCount: breakdown.length,
        mostReliableVotes,
        ratingBreakdown: breakdown,
      },
    });
  });

  scored.sort(
    (a, b) =>
      b.average - a.average ||
      b.entry.mostReliableVotes - a.entry.mostReliableVotes ||
      a.order - b.order,
  );
  return [...scored.map((s) => s.entry), ...noData];
}

// --- Consensus ranking ---

export function aggregateRankings(
  results: ReadonlyArray<Pick<RankingResult, 'orderedLabels'>>,
  anonymizer: Anonymizer,
): AggregateRanking[] {
  const labels = anonymizer.labels();
  const positions = new Map<string, number[]>(labels.map((l) => [l, []]));
  const firsts = new Map<string, number>();

  for (const result of results) {
    // Positions count among resolvable labels only
    const resolvable = result.orderedLabels.filter((l) => anonymizer.has(l));
    resolvable.forEach((label, i) => {
      positions.get(label)?.push(i + 1);
      if (i === 0) firsts.set(label, (firsts.get(label) ?? 0) + 1);
    });
  }

  const ranked: Array<{ entry: AggregateRanking; average: number; order: number }> = [];
  const noData: AggregateRanking[] = [];

  labels.forEach((label, order) => {
    const ref = anonymizer.resolve(label);
    if (!ref) return;
    const samples = positions.get(label) ?? [];
    const firstPlaceVotes = firsts.get(label) ?? 0;
    if (samples.length === 0) {
      noData.push({ label, ...ref, averagePosition: null, voteCount: 0, firstPlaceVotes });
      return;
    }
    const average = mean(samples);
    ranked.push({
      average,
      order,
      entry: {
        label,
        ...ref,
        averagePosition: round2(average),
        voteCount: samples.length,
        firstPlaceVotes,
      },
    });
  });

  ranked.sort(
    (a, b) =>
      a.average - b.average ||
      b.entry.firstPlaceVotes - a.entry.firstPlaceVotes ||
      a.order - b.order,
  );
  return [...ranked.map((r) => r.entry), ...noData];
}
