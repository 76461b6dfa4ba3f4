export type {
  CharClass,
  Entry,
  HashStatistics,
  Histogram,
  PasswordStatistics,
  RiskAssessment,
  RiskLevel,
} from "./types.js";

export { classifyChar, encodePattern, measurePassword, type PasswordMeasure } from "./classify.js";
export { truncateLeetSuffix, unleet } from "./leet.js";
export { absorbVariants, consolidateTokens, extractTokens } from "./tokens.js";
export { rankEntries, sumRange, topEntries, total } from "./histogram.js";

export { PasswordTally, analyzePasswords } from "./passwords.js";
export { analyzeHashes, readHashRecords, type HashRecord } from "./hashes.js";
export { detectUsernameAsPassword, bareAccountName } from "./usernames.js";
export { NtlmHasher, ntlmHash } from "./ntlm.js";

export {
  evaluateRisk,
  percent,
  riskLevel,
  scoreRisk,
  type RiskMetric,
  type RiskMetricName,
} from "./risk.js";
export {
  EMPTY_RISK_LABELS,
  fileRiskLabelSource,
  loadRiskLabels,
  type RiskLabelSource,
  type RiskLabels,
} from "./locales.js";

export { runAudit, deriveHashStatistics, riskMetrics, type AuditOptions } from "./audit.js";
export { maskPassword, maskStatistics } from "./mask.js";

export { AuditError, isAuditError, type AuditErrorCode } from "./errors.js";
export { err, isErr, isOk, map, ok, unwrap, type Err, type Ok, type Result } from "./result.js";
export { Logger, logger, type LogLevel } from "./logger.js";
export { ANALYSIS, HASHES, RISK } from "./config.js";
