import { fileURLToPath } from "node:url";

export const ANALYSIS = {
  /** Shortest normalized token counted as a keyword unless the caller overrides it */
  DEFAULT_MIN_TOKEN_LENGTH: 5,

  /** Entries shown in ranked tables by renderers */
  DEFAULT_TOP: 5,

  /** Fewer non-empty password lines than this cannot be compared */
  MIN_PASSWORD_LINES: 2,

  /** Lengths up to this value count as short in the risk metrics */
  SHORT_LENGTH_MAX: 10,
} as const;

export const HASHES = {
  /** LM field value when LM storage is disabled */
  DISABLED_LM: "aad3b435b51404eeaad3b435b51404ee",

  /** NT hash of the empty string */
  EMPTY_NT: "31d6cfe0d16ae931b73c59d7e0c089c0",

  /** username:rid:lm:nt */
  MIN_FIELDS: 4,
} as const;

export const RISK = {
  LOW_BELOW: 25,
  MEDIUM_BELOW: 50,
  HIGH_BELOW: 75,
} as const;

export const DEFAULT_LOCALE = "en";

const BUNDLED_LOCALES_DIR = fileURLToPath(new URL("../locales/", import.meta.url));

export function getLocalesDir(): string {
  const fromEnv = process.env.PASS_AUDIT_LOCALES_DIR?.trim();
  return fromEnv ? fromEnv : BUNDLED_LOCALES_DIR;
}

export function getDefaultLocale(): string {
  const fromEnv = process.env.PASS_AUDIT_LOCALE?.trim();
  return fromEnv ? fromEnv : DEFAULT_LOCALE;
}
