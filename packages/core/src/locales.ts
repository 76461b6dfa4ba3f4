import { readFile } from "node:fs/promises";
import { join } from "node:path";
import i18next from "i18next";
import { getLocalesDir } from "./config.js";
import { AuditError } from "./errors.js";
import type { RiskLevel } from "./types.js";

export type RiskLabels = Record<RiskLevel, string>;

/** Supplies the risk labels of a locale; rejects when they are unavailable. */
export type RiskLabelSource = (locale: string) => Promise<RiskLabels>;

export const EMPTY_RISK_LABELS: RiskLabels = {
  low: "",
  medium: "",
  high: "",
  critical: "",
};

const LABEL_KEYS = ["low", "medium", "high", "critical"] as const;

function isCatalog(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function readCatalog(path: string, locale: string): Promise<Record<string, unknown>> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(path, "utf8"));
  } catch (error) {
    throw new AuditError(
      "LOCALIZATION_UNAVAILABLE",
      `no usable catalog for locale "${locale}"`,
      { locale, path },
      error instanceof Error ? error : undefined,
    );
  }
  if (!isCatalog(parsed)) {
    throw new AuditError("LOCALIZATION_UNAVAILABLE", `catalog for locale "${locale}" is not an object`, {
      locale,
      path,
    });
  }
  return parsed;
}

/**
 * Label source backed by `<dir>/<locale>.json` catalogs (`risk.low`,
 * `risk.medium`, ...). Keys missing from a catalog resolve to "".
 */
export function fileRiskLabelSource(dir: string = getLocalesDir()): RiskLabelSource {
  return async (locale) => {
    const catalog = await readCatalog(join(dir, `${locale}.json`), locale);
    const i18n = i18next.createInstance();
    await i18n.init({
      lng: locale,
      fallbackLng: false,
      resources: { [locale]: { translation: catalog } },
      initImmediate: false,
    });

    const labels: RiskLabels = { ...EMPTY_RISK_LABELS };
    for (const key of LABEL_KEYS) {
      const path = `risk.${key}`;
      labels[key] = i18n.exists(path) ? i18n.t(path) : "";
    }
    return labels;
  };
}

/** Default source; the catalog directory is resolved on every call. */
export const loadRiskLabels: RiskLabelSource = (locale) => fileRiskLabelSource()(locale);
