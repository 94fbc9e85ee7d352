/**
 * Vote aggregation: majority ranges, per-client ranges and cross-client phrases.
 * All functions are pure over (tokens, votes).
 */

import { createHash } from 'crypto';
import { isBreakToken, normalisedText } from './tokenizer.js';

/** clientId → color at one token position, in order of first vote. */
export type VoteBucket = Map<string, string>;

export interface HighlightRange {
  start: number;
  end: number;
  color: string;
}

export interface Phrase {
  text: string;
  color: string;
  clients: string[];
  count: number;
}

/**
 * Most-voted color at one position. On equal counts the color that was voted
 * first at this position wins. Returns '' when nobody voted here.
 */
export function topColorAt(bucket: VoteBucket): string {
  const counts = new Map<string, number>();
  for (const color of bucket.values()) {
    if (!color) continue;
    counts.set(color, (counts.get(color) ?? 0) + 1);
  }
  let best = '';
  let bestCount = 0;
  for (const [color, count] of counts) {
    if (count > bestCount) {
      best = color;
      bestCount = count;
    }
  }
  return best;
}

export function rangesFromVotes(votes: readonly VoteBucket[]): HighlightRange[] {
  const ranges: HighlightRange[] = [];
  const total = votes.length;
  let i = 0;
  while (i < total) {
    const color = topColorAt(votes[i]);
    if (!color) {
      i++;
      continue;
    }
    let j = i;
    while (j + 1 < total && topColorAt(votes[j + 1]) === color) j++;
    ranges.push({ start: i, end: j, color });
    i = j + 1;
  }
  return ranges;
}

/** Truncated SHA-1 so phrase output never exposes raw client ids. */
export function hashId(value: string): string {
  return createHash('sha1').update(value, 'utf8').digest('hex').slice(0, 10);
}

/**
 * One client's same-color runs over non-break tokens. Break tokens are never
 * part of a run and always end the current one.
 */
export function clientRanges(tokens: readonly string[], votes: readonly VoteBucket[], clientId: string): HighlightRange[] {
  const res: HighlightRange[] = [];
  const limit = Math.min(tokens.length, votes.length);
  let idx = 0;
  while (idx < limit) {
    const color = votes[idx].get(clientId) ?? '';
    if (!color || isBreakToken(tokens[idx])) {
      idx++;
      continue;
    }
    let j = idx + 1;
    while (j < limit && !isBreakToken(tokens[j]) && (votes[j].get(clientId) ?? '') === color) j++;
    res.push({ start: idx, end: j - 1, color });
    idx = j;
  }
  return res;
}

/** Every client that voted anywhere, in order of their first vote position. */
export function votingClients(votes: readonly VoteBucket[]): string[] {
  const seen = new Set<string>();
  for (const bucket of votes) {
    for (const clientId of bucket.keys()) seen.add(clientId);
  }
  return [...seen];
}

/**
 * Group every client's runs by (normalised text, color). Groups come out in
 * discovery order; `clients` holds sorted hashed ids.
 */
export function phrasesAggregated(tokens: readonly string[], votes: readonly VoteBucket[]): Phrase[] {
  const n = Math.min(tokens.length, votes.length);
  const byKey = new Map<string, { text: string; color: string; clients: Set<string> }>();

  for (const clientId of votingClients(votes.slice(0, n))) {
    const hashed = hashId(clientId);
    for (const range of clientRanges(tokens, votes, clientId)) {
      const text = normalisedText(tokens.slice(range.start, range.end + 1));
      if (!text) continue;
      const key = JSON.stringify([text, range.color]);
      let group = byKey.get(key);
      if (!group) {
        group = { text, color: range.color, clients: new Set() };
        byKey.set(key, group);
      }
      group.clients.add(hashed);
    }
  }

  return [...byKey.values()].map(({ text, color, clients }) => ({
    text,
    color,
    clients: [...clients].sort(),
    count: clients.size,
  }));
}
