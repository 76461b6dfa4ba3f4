// Common leet-speak and accented substitutions
const LEET_MAP: Readonly<Record<string, string>> = {
  "0": "o",
  "1": "i",
  "3": "e",
  "4": "a",
  "5": "s",
  $: "s",
  "!": "i",
  "|": "i",
  "@": "a",
  é: "e",
  è: "e",
  à: "a",
  ù: "u",
  ç: "c",
  ï: "i",
};

const TRUNCATABLE_SUFFIXES = new Set(["i", "e", "a", "s", "o"]);

/**
 * Fold leet-speak characters to the letters they stand for, so "p@ssw0rd"
 * and "p4ssword" both become "password". Expects lowercase input.
 */
export function unleet(token: string): string {
  let out = "";
  for (const ch of token) {
    out += LEET_MAP[ch] ?? ch;
  }
  return out;
}

/**
 * Drop a trailing i/e/a/s/o from tokens of five or more characters, so that
 * "passwordi" (from "p@ssw0rd!") groups with "password".
 */
export function truncateLeetSuffix(token: string): string {
  if (token.length < 5) {
    return token;
  }
  return TRUNCATABLE_SUFFIXES.has(token.slice(-1)) ? token.slice(0, -1) : token;
}
