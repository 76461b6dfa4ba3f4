import { describe, expect, it } from "vitest";
import { total } from "./histogram.js";
import { absorbVariants, consolidateTokens, extractTokens } from "./tokens.js";

describe("extractTokens", () => {
  it("captures leet-spelled words as single tokens", () => {
    expect(extractTokens("P@ssw0rd!2024", 4)).toEqual(["passwordi"]);
    expect(extractTokens("ABCD1", 4)).toEqual(["abcdi"]);
  });

  it("returns every run of four or more allowed characters", () => {
    expect(extractTokens("summer#winter#sun", 4)).toEqual(["summer", "winter"]);
    expect(extractTokens("été#chat", 4)).toEqual(["chat"]);
    expect(extractTokens("bébé", 4)).toEqual(["bebe"]);
  });

  it("drops tokens shorter than the minimum length", () => {
    expect(extractTokens("abcd#password", 5)).toEqual(["password"]);
    expect(extractTokens("1234", 4)).toEqual([]);
  });

  it("counts repeated tokens in one line separately", () => {
    expect(extractTokens("love-love", 4)).toEqual(["love", "love"]);
  });
});

describe("absorbVariants", () => {
  it("folds extended variants into the root they contain", () => {
    const result = absorbVariants([
      { key: "password", count: 5 },
      { key: "admin", count: 3 },
      { key: "passwords", count: 2 },
      { key: "mypassword", count: 1 },
    ]);
    expect(result).toEqual([
      { key: "password", count: 8 },
      { key: "admin", count: 3 },
    ]);
  });

  it("carries absorbed counts forward to the shortest root", () => {
    const result = absorbVariants([
      { key: "abcdef", count: 3 },
      { key: "abcd", count: 2 },
      { key: "abc", count: 1 },
    ]);
    expect(result).toEqual([{ key: "abc", count: 6 }]);
  });

  it("does not modify its input", () => {
    const input = [
      { key: "hello", count: 2 },
      { key: "helloworld", count: 1 },
    ];
    absorbVariants(input);
    expect(input[0]).toEqual({ key: "hello", count: 2 });
  });
});

describe("consolidateTokens", () => {
  it("keeps the plain strategy when both strategies agree", () => {
    const tokens = new Map([
      ["abcd", 2],
      ["abcdi", 1],
    ]);
    expect(consolidateTokens(tokens, 4)).toEqual(new Map([["abcd", 3]]));
  });

  it("prefers the truncated strategy when it yields a stronger keyword", () => {
    const tokens = new Map([
      ["bonjoura", 1],
      ["bonjourz", 1],
    ]);
    expect(consolidateTokens(tokens, 4)).toEqual(new Map([["bonjour", 2]]));
  });

  it("does not truncate below the minimum length", () => {
    const tokens = new Map([
      ["bonjoura", 1],
      ["bonjourz", 1],
    ]);
    expect(consolidateTokens(tokens, 8)).toEqual(
      new Map([
        ["bonjoura", 1],
        ["bonjourz", 1],
      ]),
    );
  });

  it("preserves the total count", () => {
    const tokens = new Map([
      ["password", 4],
      ["passwordi", 3],
      ["soleil", 2],
      ["soleils", 2],
      ["admin", 1],
      ["administrator", 1],
      ["marie", 1],
    ]);
    const consolidated = consolidateTokens(tokens, 4);
    expect(total(consolidated)).toBe(total(tokens));
  });

  it("leaves no surviving key inside another", () => {
    const tokens = new Map([
      ["password", 4],
      ["passwordi", 3],
      ["soleil", 2],
      ["soleils", 2],
      ["admin", 1],
      ["administrator", 1],
    ]);
    const keys = [...consolidateTokens(tokens, 4).keys()];
    for (const a of keys) {
      for (const b of keys) {
        if (a !== b) {
          expect(b.includes(a)).toBe(false);
        }
      }
    }
  });

  it("returns an empty histogram for no tokens", () => {
    expect(consolidateTokens(new Map(), 4).size).toBe(0);
  });
});
