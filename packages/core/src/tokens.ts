import { bump, rankEntries, toHistogram } from "./histogram.js";
import { truncateLeetSuffix, unleet } from "./leet.js";
import type { Entry, Histogram } from "./types.js";

// Runs of letters plus the leet characters, so "p@ssw0rd" is one token.
const TOKEN_PATTERN = /[A-Za-z01345$!|@é]{4,}/g;

/** Normalized keyword candidates of one password line. */
export function extractTokens(line: string, minLength: number): string[] {
  const tokens: string[] = [];
  for (const match of line.matchAll(TOKEN_PATTERN)) {
    const token = unleet(match[0].toLowerCase());
    if (token.length >= minLength) {
      tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Fold every entry into the first other entry (in rank order) whose key it
 * contains, e.g. "passwords" into "password". Absorbed entries are neither
 * sources nor targets afterwards, so the total count is unchanged.
 */
export function absorbVariants(ranked: readonly Entry[]): Entry[] {
  const entries = ranked.map((entry) => ({ ...entry }));
  const absorbed = new Array<boolean>(entries.length).fill(false);

  for (let i = 0; i < entries.length; i++) {
    if (absorbed[i]) continue;
    for (let j = 0; j < entries.length; j++) {
      if (i === j || absorbed[j]) continue;
      if (entries[i].key.includes(entries[j].key)) {
        entries[j].count += entries[i].count;
        absorbed[i] = true;
        break;
      }
    }
  }

  return entries.filter((_, i) => !absorbed[i]);
}

function truncateKeys(tokens: Histogram, minLength: number): Histogram {
  const truncated: Histogram = new Map();
  for (const [token, count] of tokens) {
    const base = truncateLeetSuffix(token);
    bump(truncated, base.length >= minLength ? base : token, count);
  }
  return truncated;
}

function maxCount(entries: readonly Entry[]): number {
  return entries.reduce((max, entry) => Math.max(max, entry.count), 0);
}

/**
 * Merge near-duplicate keywords. Two candidates are built, plain substring
 * absorption and absorption after suffix truncation; the one whose strongest
 * keyword is strictly stronger wins, the plain one on a tie.
 */
export function consolidateTokens(tokens: Histogram, minLength: number): Histogram {
  const plain = absorbVariants(rankEntries(tokens));
  const truncated = absorbVariants(rankEntries(truncateKeys(tokens, minLength)));
  return toHistogram(maxCount(truncated) > maxCount(plain) ? truncated : plain);
}
