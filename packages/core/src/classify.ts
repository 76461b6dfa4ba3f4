import type { CharClass } from "./types.js";

const UPPER = /\p{Lu}/u;
const LOWER = /\p{Ll}/u;
const DIGIT = /\p{Nd}/u;

/** Classify one code point. */
export function classifyChar(ch: string): CharClass {
  if (UPPER.test(ch)) return "u";
  if (LOWER.test(ch)) return "l";
  if (DIGIT.test(ch)) return "d";
  return "s";
}

export type PasswordMeasure = {
  /** Length in code points */
  length: number;
  /** Distinct character classes present, 1-4 (0 for "") */
  complexity: number;
};

export function measurePassword(password: string): PasswordMeasure {
  const seen = new Set<CharClass>();
  let length = 0;
  for (const ch of password) {
    seen.add(classifyChar(ch));
    length++;
  }
  return { length, complexity: seen.size };
}

/** One class symbol per code point, e.g. "Passw1" -> "ulllld". */
export function encodePattern(password: string): string {
  let pattern = "";
  for (const ch of password) {
    pattern += classifyChar(ch);
  }
  return pattern;
}
