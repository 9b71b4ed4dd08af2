import { describe, expect, it } from "vitest";
import { matchesAllTokens, tokenize } from "../src/utils/text.js";

describe("text utils", () => {
  it("tokenizes unicode words with singular variants", () => {
    expect(tokenize("Cats and dogs, cats!")).toEqual(["cats", "cat", "and", "dogs", "dog"]);
    expect(tokenize("Glass über 42")).toEqual(["glass", "über", "42"]);
  });

  it("requires every query word to appear in the target", () => {
    expect(matchesAllTokens("welcome", "Welcome Page")).toBe(true);
    expect(matchesAllTokens("welcome home", "Welcome Page")).toBe(false);
    expect(matchesAllTokens("images", "An image of the harbour")).toBe(true);
    expect(matchesAllTokens("   ", "anything")).toBe(false);
  });
});
