import crypto from "node:crypto";
import { describe, expect, it } from "vitest";
import { stableId, toCandidate } from "../../src/ingest";
import { makeListing } from "../helpers";

describe("stableId", () => {
  it("hashes source, url, title and raw deadline joined by pipes", () => {
    const listing = makeListing({ rawDeadlineText: "March 15, 2025" });
    const expected = crypto
      .createHash("sha256")
      .update("county-bids|https://bids.example.gov/open/road|Road resurfacing|March 15, 2025")
      .digest("hex");

    expect(stableId(listing)).toBe(expected);
    expect(stableId(listing)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("uses an empty deadline part when none was found", () => {
    const expected = crypto
      .createHash("sha256")
      .update("county-bids|https://bids.example.gov/open/road|Road resurfacing|")
      .digest("hex");

    expect(stableId(makeListing())).toBe(expected);
  });

  it("changes when the deadline text is reworded", () => {
    expect(stableId(makeListing({ rawDeadlineText: "3/15/2025" }))).not.toBe(
      stableId(makeListing({ rawDeadlineText: "March 15, 2025" })),
    );
  });

  it("ignores fields outside the identity", () => {
    expect(stableId(makeListing({ description: "one" }))).toBe(stableId(makeListing({ description: "two" })));
  });
});

describe("toCandidate", () => {
  it("attaches the id and fetch time", () => {
    const listing = makeListing();

    const candidate = toCandidate(listing, "2025-01-01T00:00:00.000Z");

    expect(candidate).toEqual({ ...listing, id: stableId(listing), fetchedAt: "2025-01-01T00:00:00.000Z" });
  });
});
