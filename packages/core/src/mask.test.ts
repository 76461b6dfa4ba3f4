import { describe, expect, it } from "vitest";
import { maskPassword, maskStatistics } from "./mask.js";
import { emptyHashStatistics } from "./passwords.js";
import type { PasswordStatistics } from "./types.js";

describe("maskPassword", () => {
  it("keeps the first two and last two characters", () => {
    expect(maskPassword("password")).toBe("pa****rd");
    expect(maskPassword("Summer2024!")).toBe("Su*******4!");
    expect(maskPassword("abcde")).toBe("ab*de");
  });

  it("leaves passwords of four characters or fewer unchanged", () => {
    expect(maskPassword("abcd")).toBe("abcd");
    expect(maskPassword("")).toBe("");
  });

  it("counts code points", () => {
    expect(maskPassword("😀😀secret😀😀")).toBe("😀😀******😀😀");
  });
});

describe("maskStatistics", () => {
  const stats: PasswordStatistics = {
    crackedCount: 3,
    lengths: new Map([[8, 3]]),
    complexity: new Map([[1, 3]]),
    patterns: new Map([["llllllll", 3]]),
    occurrences: new Map([
      ["password", 2],
      ["passward", 1],
    ]),
    tokens: new Map([["password", 3]]),
    reuseCount: 2,
    hashes: emptyHashStatistics(),
    globalPercent: 0,
    risk: "",
    top: 5,
  };

  it("masks occurrence keys and sums collisions", () => {
    const masked = maskStatistics(stats);
    expect(masked.occurrences).toEqual(new Map([["pa****rd", 3]]));
    expect(masked.tokens).toEqual(new Map([["password", 3]]));
  });

  it("does not modify the input", () => {
    maskStatistics(stats);
    expect(stats.occurrences.get("password")).toBe(2);
  });
});
