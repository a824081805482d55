/**
 * Tolerant recognizers for the structured tail of free-text evaluations.
 *
 * Two branches per schema: the marker branch reads the block under
 * "FACT CHECK SUMMARY:" / "FINAL RANKING:"; the fallback branch scans the whole
 * text for "Response X" tokens. Neither throws.
 */

import { RATINGS, type ParsedFactCheck, type ParsedRanking, type Rating } from './types.js';

export const FACT_CHECK_MARKER = 'FACT CHECK SUMMARY';
export const RANKING_MARKER = 'FINAL RANKING';

// Labels are upper-case only; "1. an answer" is not a label.
const LABEL = '[A-Z]{1,2}';
const LABEL_TOKEN = new RegExp(`\\b[Rr]esponse\\s+(${LABEL})\\b`, 'g');
const LABEL_VALUE = new RegExp(`^(?:[Rr]esponse\\s+)?(${LABEL})\\b`);
const KEY_VALUE = new RegExp(`^(?:[Rr]esponse\\s+)?(${LABEL})\\s*:\\s*(.+)$`);
const MOST_RELIABLE = /^most[\s_-]+reliable\s*:\s*(.*)$/i;
const LIST_ITEM = /^(?:\d+\s*[.)]|[-•])\s*(.*)$/;
const BULLET = /^[-•]\s+/;
const RESPONSE_LABEL = new RegExp(`^[Rr]esponse\\s+(${LABEL})\\b`);

/** Drop markdown emphasis / heading / quote decoration around a line. */
function plain(line: string): string {
  return line
    .replace(/^\s*(?:#+|>)\s*/, '')
    .replace(/[*`]+/g, '')
    .trim();
}

/** Lines of the block under the last marker, or null when there is no marker. */
export function markerBlock(text: string, marker: string): string[] | null {
  const lines = text.split(/\r?\n/);
  const wanted = marker.toUpperCase();
  let markerAt = -1;
  for (let i = 0; i < lines.length; i++) {
    const candidate = plain(lines[i]).toUpperCase().replace(/\s*:$/, '');
    if (candidate === wanted) markerAt = i;
  }
  if (markerAt === -1) return null;

  const block: string[] = [];
  for (let i = markerAt + 1; i < lines.length; i++) {
    const line = plain(lines[i]);
    if (!line) {
      if (block.length === 0) continue;
      break;
    }
    block.push(line);
  }
  return block;
}

/** First-appearance order of "Response X" tokens anywhere in the text. */
export function scanLabels(text: string): string[] {
  const seen = new Set<string>();
  for (const match of text.matchAll(LABEL_TOKEN)) {
    seen.add(match[1]);
  }
  return [...seen];
}

// Longest first so MOSTLY_ACCURATE is tried before ACCURATE.
const RATING_PREFIX = new RegExp(
  `^[[("']*\\s*(${[...RATINGS]
    .sort((a, b) => b.length - a.length)
    .map((r) => r.replace(/_/g, '[\\s_-]+'))
    .join('|')})\\s*[\\])"']*(?=$|[\\s.,;:!(-])`,
  'i',
);

/**
 * Rating word at the start of a value; any commentary after it is ignored.
 * "mostly accurate", "Mostly_Accurate", "MIXED (two errors)" → the rating
 */
export function parseRating(value: string): Rating | null {
  const match = RATING_PREFIX.exec(value.trim());
  if (!match) return null;
  const key = match[1].toUpperCase().replace(/[\s_-]+/g, '_');
  return RATINGS.find((r) => r === key) ?? null;
}

function splitKnown(
  labels: string[],
  knownLabels?: ReadonlySet<string>,
): { kept: string[]; discarded: string[] } {
  if (!knownLabels) return { kept: labels, discarded: [] };
  const kept: string[] = [];
  const discarded: string[] = [];
  for (const label of labels) {
    (knownLabels.has(label) ? kept : discarded).push(label);
  }
  return { kept, discarded };
}

// --- Fact-check ---

function factCheckFromMarker(block: string[]): Pick<ParsedFactCheck, 'ratings' | 'mostReliable'> & {
  parsedLines: number;
} {
  const ratings: Record<string, Rating> = {};
  let mostReliable: string | null = null;
  let parsedLines = 0;

  for (const raw of block) {
    const line = raw.replace(BULLET, '');
    const vote = MOST_RELIABLE.exec(line);
    if (vote) {
      const label = LABEL_VALUE.exec(vote[1].trim());
      if (label) {
        mostReliable = label[1];
        parsedLines++;
      }
      continue;
    }
    const kv = KEY_VALUE.exec(line);
    if (!kv) continue;
    const rating = parseRating(kv[2]);
    if (!rating) continue;
    ratings[kv[1]] = rating;
    parsedLines++;
  }
  return { ratings, mostReliable, parsedLines };
}

export function parseFactCheck(text: string, knownLabels?: ReadonlySet<string>): ParsedFactCheck {
  const block = markerBlock(text, FACT_CHECK_MARKER);
  if (block) {
    const { ratings, mostReliable, parsedLines } = factCheckFromMarker(block);
    if (parsedLines > 0) {
      const discarded: string[] = [];
      const kept: Record<string, Rating> = {};
      for (const [label, rating] of Object.entries(ratings)) {
        if (knownLabels && !knownLabels.has(label)) discarded.push(label);
        else kept[label] = rating;
      }
      let vote = mostReliable;
      if (vote && knownLabels && !knownLabels.has(vote)) {
        if (!discarded.includes(vote)) discarded.push(vote);
        vote = null;
      }
      return {
        ratings: kept,
        mostReliable: vote,
        mentionOrder: [],
        discardedLabels: discarded,
        strategy: 'marker',
      };
    }
  }

  const { kept, discarded } = splitKnown(scanLabels(text), knownLabels);
  return {
    ratings: {},
    mostReliable: null,
    mentionOrder: kept,
    discardedLabels: discarded,
    strategy: 'fallback',
  };
}

// --- Ranking ---

export function parseRanking(text: string, knownLabels?: ReadonlySet<string>): ParsedRanking {
  const block = markerBlock(text, RANKING_MARKER);
  if (block) {
    const ordered: string[] = [];
    for (const line of block) {
      const item = LIST_ITEM.exec(line);
      const match = item ? LABEL_VALUE.exec(item[1].trim()) : RESPONSE_LABEL.exec(line);
      if (!match) continue;
      const label = match[1];
      if (!ordered.includes(label)) ordered.push(label);
    }
    if (ordered.length > 0) {
      const { kept, discarded } = splitKnown(ordered, knownLabels);
      return { orderedLabels: kept, discardedLabels: discarded, strategy: 'marker' };
    }
  }

  const { kept, discarded } = splitKnown(scanLabels(text), knownLabels);
  return { orderedLabels: kept, discardedLabels: discarded, strategy: 'fallback' };
}
