import { describe, expect, it } from "vitest";
import { chunkLines } from "../../src/telegram/chunk";

describe("chunkLines", () => {
  it("keeps short output in one message", () => {
    expect(chunkLines(["a", "", "b"])).toEqual(["a\n\nb"]);
  });

  it("breaks between lines when the limit is reached", () => {
    expect(chunkLines(["aaaa", "bbbb", "cc"], 9)).toEqual(["aaaa\nbbbb", "cc"]);
  });

  it("cuts a single line longer than the limit", () => {
    expect(chunkLines(["x", "abcdefghij"], 4)).toEqual(["x", "abcd", "efgh", "ij"]);
  });

  it("does not split a character outside the basic plane", () => {
    expect(chunkLines(["a📅"], 2)).toEqual(["a", "📅"]);
  });

  it("returns nothing for no lines", () => {
    expect(chunkLines([])).toEqual([]);
  });
});
