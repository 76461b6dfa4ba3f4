import { encodePattern, measurePassword } from "./classify.js";
import { ANALYSIS } from "./config.js";
import { AuditError } from "./errors.js";
import { bump, mergeInto } from "./histogram.js";
import { readLines } from "./input.js";
import { logger } from "./logger.js";
import { err, ok, type Result } from "./result.js";
import { consolidateTokens, extractTokens } from "./tokens.js";
import type { HashStatistics, Histogram, PasswordStatistics } from "./types.js";

const log = logger.child({ module: "passwords" });

export function emptyHashStatistics(): HashStatistics {
  return {
    total: 0,
    unique: 0,
    reused: 0,
    lmPresent: 0,
    emptyNt: 0,
    hasHashData: false,
    usernameMatches: [],
  };
}

/**
 * Running counts over password lines. Tallies built over separate shards of
 * a corpus can be merged before `finish`, which is the only step that looks
 * at the corpus as a whole.
 */
export class PasswordTally {
  crackedCount = 0;
  readonly lengths: Histogram<number> = new Map();
  readonly complexity: Histogram<number> = new Map();
  readonly patterns: Histogram = new Map();
  readonly occurrences: Histogram = new Map();
  readonly tokens: Histogram = new Map();

  constructor(readonly minTokenLength: number = ANALYSIS.DEFAULT_MIN_TOKEN_LENGTH) {}

  /** Count one password line. Empty lines are ignored. */
  add(line: string): void {
    if (line === "") {
      return;
    }
    const { length, complexity } = measurePassword(line);
    this.crackedCount++;
    bump(this.lengths, length);
    bump(this.complexity, complexity);
    bump(this.patterns, encodePattern(line));
    bump(this.occurrences, line);
    for (const token of extractTokens(line, this.minTokenLength)) {
      bump(this.tokens, token);
    }
  }

  merge(other: PasswordTally): this {
    if (other.minTokenLength !== this.minTokenLength) {
      throw new RangeError(
        `cannot merge tallies with minimum token lengths ${this.minTokenLength} and ${other.minTokenLength}`,
      );
    }
    this.crackedCount += other.crackedCount;
    mergeInto(this.lengths, other.lengths);
    mergeInto(this.complexity, other.complexity);
    mergeInto(this.patterns, other.patterns);
    mergeInto(this.occurrences, other.occurrences);
    mergeInto(this.tokens, other.tokens);
    return this;
  }

  finish(): Result<PasswordStatistics> {
    if (this.crackedCount < ANALYSIS.MIN_PASSWORD_LINES) {
      return err(
        new AuditError(
          "INSUFFICIENT_DATA",
          `password file must contain at least ${ANALYSIS.MIN_PASSWORD_LINES} passwords`,
          { found: this.crackedCount },
        ),
      );
    }

    let reuseCount = 0;
    for (const count of this.occurrences.values()) {
      if (count > 1) {
        reuseCount += count;
      }
    }

    return ok({
      crackedCount: this.crackedCount,
      lengths: new Map(this.lengths),
      complexity: new Map(this.complexity),
      patterns: new Map(this.patterns),
      occurrences: new Map(this.occurrences),
      tokens: consolidateTokens(this.tokens, this.minTokenLength),
      reuseCount,
      hashes: emptyHashStatistics(),
      globalPercent: 0,
      risk: "",
      top: ANALYSIS.DEFAULT_TOP,
    });
  }
}

/**
 * Analyze a file of cracked passwords, one per line.
 *
 * Resolves to an INSUFFICIENT_DATA error result when fewer than two
 * non-empty lines are present; rejects with IO_ERROR when the file cannot
 * be read.
 */
export async function analyzePasswords(
  path: string,
  minTokenLength: number = ANALYSIS.DEFAULT_MIN_TOKEN_LENGTH,
): Promise<Result<PasswordStatistics>> {
  const tally = new PasswordTally(minTokenLength);
  for await (const line of readLines(path)) {
    tally.add(line);
  }
  log.debug("password file scanned", {
    path,
    passwords: tally.crackedCount,
    distinctTokens: tally.tokens.size,
  });
  return tally.finish();
}
