import { load } from "cheerio";
import { describe, expect, it } from "vitest";
import { createMatchers, isValidSelector, matchFirst, matchUnion } from "../../src/crawl/selectors";

const $ = load(`<a class="primary" href="/1">1</a><a href="/2">2</a><span>3</span>`);

describe("selector matching", () => {
  it("unions every matcher in order, duplicates included", () => {
    const hrefs = matchUnion($, createMatchers(["a.primary", "a"])).map((element) => $(element).attr("href"));

    expect(hrefs).toEqual(["/1", "/1", "/2"]);
  });

  it("returns only the first non-empty match set", () => {
    const hrefs = matchFirst($, createMatchers(["a.missing", "a", "a.primary"])).map((element) =>
      $(element).attr("href"),
    );

    expect(hrefs).toEqual(["/1", "/2"]);
    expect(matchFirst($, createMatchers(["a.missing"]))).toEqual([]);
  });
});

describe("isValidSelector", () => {
  it("accepts well-formed selectors", () => {
    expect(isValidSelector("div.rfp a")).toBe(true);
    expect(isValidSelector("a[href$='.pdf']")).toBe(true);
  });

  it("rejects blank and malformed selectors", () => {
    expect(isValidSelector("   ")).toBe(false);
    expect(isValidSelector("a[href")).toBe(false);
  });
});
