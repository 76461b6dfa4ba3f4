import { bump } from "./histogram.js";
import type { Histogram, PasswordStatistics } from "./types.js";

/** "password" -> "pa****rd". Passwords of four code points or fewer are kept. */
export function maskPassword(password: string): string {
  const chars = Array.from(password);
  if (chars.length <= 4) {
    return password;
  }
  return chars.slice(0, 2).join("") + "*".repeat(chars.length - 4) + chars.slice(-2).join("");
}

/**
 * Copy of `stats` whose per-password occurrence keys are masked. Masked keys
 * that collide are summed. Keyword tokens stay readable.
 */
export function maskStatistics(stats: PasswordStatistics): PasswordStatistics {
  const occurrences: Histogram = new Map();
  for (const [password, count] of stats.occurrences) {
    bump(occurrences, maskPassword(password), count);
  }
  return { ...stats, occurrences };
}
