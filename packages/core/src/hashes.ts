import { HASHES } from "./config.js";
import { bump } from "./histogram.js";
import { readColonRecords } from "./input.js";
import { logger } from "./logger.js";
import type { HashStatistics, Histogram } from "./types.js";

const log = logger.child({ module: "hashes" });

/** One pwdump / secretsdump line: `[DOMAIN\]user:rid:lmhash:nthash:::` */
export type HashRecord = {
  account: string;
  rid: string;
  lmHash: string;
  ntHash: string;
};

export function toHashRecord(fields: readonly string[]): HashRecord | null {
  if (fields.length < HASHES.MIN_FIELDS) {
    return null;
  }
  const [account, rid, lmHash, ntHash] = fields;
  return { account, rid, lmHash, ntHash };
}

/** Records of a hash file; lines with fewer than four fields are skipped. */
export async function* readHashRecords(path: string): AsyncGenerator<HashRecord> {
  let skipped = 0;
  for await (const fields of readColonRecords(path)) {
    const record = toHashRecord(fields);
    if (record) {
      yield record;
    } else {
      skipped++;
    }
  }
  if (skipped > 0) {
    log.debug("skipped malformed hash records", { path, skipped });
  }
}

export function isEmptyNtHash(ntHash: string): boolean {
  return ntHash === "" || ntHash.toLowerCase() === HASHES.EMPTY_NT;
}

export function hasCrackableLmHash(lmHash: string): boolean {
  return lmHash !== "" && lmHash.toLowerCase() !== HASHES.DISABLED_LM;
}

/**
 * Totals, uniqueness and reuse of the NT hashes in a hash file, plus LM and
 * empty-password indicators. `usernameMatches` is left empty; see
 * `detectUsernameAsPassword`.
 */
export async function analyzeHashes(path: string): Promise<HashStatistics> {
  const stats: HashStatistics = {
    total: 0,
    unique: 0,
    reused: 0,
    lmPresent: 0,
    emptyNt: 0,
    hasHashData: true,
    usernameMatches: [],
  };
  const seen: Histogram = new Map();

  for await (const record of readHashRecords(path)) {
    stats.total++;
    if (isEmptyNtHash(record.ntHash)) {
      stats.emptyNt++;
    }
    bump(seen, record.ntHash);
    if (hasCrackableLmHash(record.lmHash)) {
      stats.lmPresent++;
    }
  }

  for (const count of seen.values()) {
    if (count === 1) {
      stats.unique++;
    }
  }
  // Empty-password hashes that occur once count as unique here.
  // TODO: confirm with product whether they belong under reused instead.
  stats.reused = stats.total - stats.unique;

  return stats;
}
