import { RISK } from "./config.js";
import { EMPTY_RISK_LABELS, loadRiskLabels, type RiskLabelSource, type RiskLabels } from "./locales.js";
import { logger } from "./logger.js";
import type { RiskAssessment, RiskLevel } from "./types.js";

const log = logger.child({ module: "risk" });

export type RiskMetricName = "reuse" | "weakComplexity" | "shortLength" | "crackRate";

export type RiskMetric = {
  name: RiskMetricName;
  /** 0-100 */
  percent: number;
};

/** `part` as a percentage of `total`, one decimal place; 0 when total is 0. */
export function percent(part: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  return Math.round((part / total) * 1000) / 10;
}

export function riskLevel(score: number): RiskLevel {
  if (score < RISK.LOW_BELOW) return "low";
  if (score < RISK.MEDIUM_BELOW) return "medium";
  if (score < RISK.HIGH_BELOW) return "high";
  return "critical";
}

/** Unweighted mean of the metrics, two decimal places, and its bucket. */
export function scoreRisk(metrics: readonly RiskMetric[]): Pick<RiskAssessment, "score" | "level"> {
  if (metrics.length === 0) {
    return { score: 0, level: "not-applicable" };
  }
  const sum = metrics.reduce((acc, metric) => acc + metric.percent, 0);
  const score = Math.round((sum / metrics.length) * 100) / 100;
  return { score, level: riskLevel(score) };
}

const NOT_APPLICABLE = "N/A";

/**
 * Score the metrics and label the result in `locale`. When the label source
 * fails the assessment is still returned, with an empty label.
 */
export async function evaluateRisk(
  locale: string,
  metrics: readonly RiskMetric[],
  labelSource: RiskLabelSource = loadRiskLabels,
): Promise<RiskAssessment> {
  const { score, level } = scoreRisk(metrics);
  if (level === "not-applicable") {
    return { label: NOT_APPLICABLE, score, level };
  }

  let labels: RiskLabels;
  try {
    labels = await labelSource(locale);
  } catch (error) {
    log.warn("risk labels unavailable, continuing without them", {
      locale,
      reason: error instanceof Error ? error.message : String(error),
    });
    labels = EMPTY_RISK_LABELS;
  }

  return { label: labels[level], score, level };
}
