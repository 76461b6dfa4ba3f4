import { ANALYSIS, getDefaultLocale } from "./config.js";
import { AuditError } from "./errors.js";
import { analyzeHashes } from "./hashes.js";
import { sumRange } from "./histogram.js";
import type { RiskLabelSource } from "./locales.js";
import { logger } from "./logger.js";
import { maskStatistics } from "./mask.js";
import { analyzePasswords } from "./passwords.js";
import { err, isErr, ok, type Result } from "./result.js";
import { evaluateRisk, percent, type RiskMetric } from "./risk.js";
import type { HashStatistics, PasswordStatistics } from "./types.js";
import { detectUsernameAsPassword } from "./usernames.js";

const log = logger.child({ module: "audit" });

export type AuditOptions = {
  passwordFile: string;
  /** pwdump-style file; without it hash figures are derived from the cracked passwords */
  hashFile?: string;
  minTokenLength?: number;
  top?: number;
  locale?: string;
  /** Mask per-password keys in the result */
  anonymize?: boolean;
  labelSource?: RiskLabelSource;
  detectUsernames?: (hashFile: string) => Promise<string[]>;
};

/** Hash figures implied by the cracked passwords alone. */
export function deriveHashStatistics(stats: PasswordStatistics): HashStatistics {
  return {
    total: stats.crackedCount,
    unique: stats.crackedCount - stats.reuseCount,
    reused: stats.reuseCount,
    lmPresent: 0,
    emptyNt: 0,
    hasHashData: false,
    usernameMatches: [],
  };
}

/**
 * Reuse, weak complexity (fewer than four classes) and short length shares,
 * plus the crack rate when real hash data is present.
 */
export function riskMetrics(stats: PasswordStatistics): RiskMetric[] {
  const { hashes, complexity, crackedCount } = stats;
  const weak = (complexity.get(1) ?? 0) + (complexity.get(2) ?? 0) + (complexity.get(3) ?? 0);

  const metrics: RiskMetric[] = [
    { name: "reuse", percent: percent(hashes.reused, hashes.total) },
    { name: "weakComplexity", percent: percent(weak, crackedCount) },
    {
      name: "shortLength",
      percent: percent(sumRange(stats.lengths, 0, ANALYSIS.SHORT_LENGTH_MAX), crackedCount),
    },
  ];
  if (hashes.hasHashData) {
    metrics.push({ name: "crackRate", percent: percent(crackedCount, hashes.total) });
  }
  return metrics;
}

/** A failed detection is logged and reported as no matches. */
async function usernameMatches(
  hashFile: string,
  detect: (hashFile: string) => Promise<string[]>,
): Promise<string[]> {
  try {
    return await detect(hashFile);
  } catch (error) {
    log.error("username-as-password detection failed", error, { hashFile });
    return [];
  }
}

/**
 * Full audit: password analysis, optional hash analysis and
 * username-as-password detection, then risk evaluation.
 */
export async function runAudit(options: AuditOptions): Promise<Result<PasswordStatistics>> {
  const analyzed = await analyzePasswords(
    options.passwordFile,
    options.minTokenLength ?? ANALYSIS.DEFAULT_MIN_TOKEN_LENGTH,
  );
  if (isErr(analyzed)) {
    return analyzed;
  }
  let stats: PasswordStatistics = { ...analyzed.value, top: options.top ?? ANALYSIS.DEFAULT_TOP };

  if (options.hashFile) {
    const hashes = await analyzeHashes(options.hashFile);
    hashes.usernameMatches = await usernameMatches(
      options.hashFile,
      options.detectUsernames ?? detectUsernameAsPassword,
    );
    if (hashes.total < stats.crackedCount) {
      return err(
        new AuditError(
          "HASH_COUNT_MISMATCH",
          `hash file contains fewer records (${hashes.total}) than password file (${stats.crackedCount})`,
          { hashes: hashes.total, passwords: stats.crackedCount },
        ),
      );
    }
    stats.hashes = hashes;
  } else {
    log.warn("no hash file provided, hash statistics derived from cracked passwords");
    stats.hashes = deriveHashStatistics(stats);
  }

  const risk = await evaluateRisk(
    options.locale ?? getDefaultLocale(),
    riskMetrics(stats),
    options.labelSource,
  );
  stats.risk = risk.label;
  stats.globalPercent = risk.score;

  if (options.anonymize) {
    stats = maskStatistics(stats);
  }

  log.info("audit complete", {
    passwords: stats.crackedCount,
    hashes: stats.hashes.total,
    score: stats.globalPercent,
    level: risk.level,
  });
  return ok(stats);
}
