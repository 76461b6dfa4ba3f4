export type Entry = { key: string; count: number };

export type Histogram<K extends string | number = string> = Map<K, number>;

/** l = lowercase, u = uppercase, d = decimal digit, s = anything else */
export type CharClass = "l" | "u" | "d" | "s";

export type HashStatistics = {
  total: number;
  /** Distinct NT hashes seen exactly once */
  unique: number;
  /** total - unique */
  reused: number;
  /** Records carrying a crackable LM hash */
  lmPresent: number;
  /** Records whose NT hash is empty or the hash of "" */
  emptyNt: number;
  /** false when the figures were derived from the cracked passwords alone */
  hasHashData: boolean;
  usernameMatches: string[];
};

export type RiskLevel = "low" | "medium" | "high" | "critical";

export type RiskAssessment = {
  label: string;
  score: number;
  level: RiskLevel | "not-applicable";
};

export type PasswordStatistics = {
  crackedCount: number;
  lengths: Histogram<number>;
  /** Number of character classes (1-4) -> passwords */
  complexity: Histogram<number>;
  patterns: Histogram;
  /** Password -> occurrences */
  occurrences: Histogram;
  /** Consolidated keyword -> occurrences */
  tokens: Histogram;
  /** Passwords belonging to an occurrence count above one */
  reuseCount: number;
  hashes: HashStatistics;
  globalPercent: number;
  risk: string;
  top: number;
};
