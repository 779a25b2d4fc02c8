import { describe, expect, it } from "vitest";
import { toCandidate } from "../../src/ingest";
import { buildTags, formatTags, oneLiner, RulesScorer } from "../../src/score";
import { makeListing } from "../helpers";

const now = new Date("2025-01-01T00:00:00Z");
const fetchedAt = "2025-01-01T00:00:00.000Z";

describe("RulesScorer", () => {
  it("scores a well-funded opportunity with a distant deadline as GO", () => {
    const candidate = toCandidate(
      makeListing({ rawDeadlineText: "March 15, 2025", description: "Total budget $400,000 over two years." }),
      fetchedAt,
    );

    const record = new RulesScorer().score(candidate, now);

    expect(record.deadline).toBe("2025-03-15");
    expect(record.deadlineBucket).toBe("planning");
    expect(record.budgetValue).toBe(400_000);
    expect(record.budgetBucket).toBe("mid");
    expect(record.decision).toBe("GO");
    expect(record.oneLiner).toBe("Example County opportunity - mid budget, planning deadline");
    expect(record.tags).toEqual([
      "decision_GO",
      "buyer_county",
      "budget_mid",
      "region_us-east",
      "deadline_planning",
    ]);
    expect(record.id).toBe(candidate.id);
    expect(record.fetchedAt).toBe(fetchedAt);
  });

  it("falls back to unknown buckets and NO_GO when nothing is found", () => {
    const candidate = toCandidate(makeListing({ description: "See attached documents." }), fetchedAt);

    const record = new RulesScorer().score(candidate, now);

    expect(record.deadline).toBeNull();
    expect(record.deadlineBucket).toBe("unknown");
    expect(record.budgetValue).toBeNull();
    expect(record.budgetBucket).toBe("unknown");
    expect(record.decision).toBe("NO_GO");
    expect(record.oneLiner).toBe("Example County opportunity - unknown budget, unknown deadline");
  });

  it("returns MAYBE for a near-term deadline with a small budget", () => {
    const candidate = toCandidate(
      makeListing({ rawDeadlineText: "1/20/2025", description: "Estimated value USD 75K" }),
      fetchedAt,
    );

    const record = new RulesScorer().score(candidate, now);

    expect(record.deadline).toBe("2025-01-20");
    expect(record.budgetValue).toBe(75_000);
    expect(record.decision).toBe("MAYBE");
  });

  it("leaves the candidate untouched", () => {
    const candidate = toCandidate(makeListing({ rawDeadlineText: "3/4/2025" }), fetchedAt);
    const before = { ...candidate };

    new RulesScorer().score(candidate, now);

    expect(candidate).toEqual(before);
  });
});

describe("tags", () => {
  it("keeps a fixed token order and defaults missing parts", () => {
    expect(buildTags({})).toEqual([
      "decision_NO_GO",
      "buyer_unknown",
      "budget_unknown",
      "region_unknown",
      "deadline_unknown",
    ]);
    expect(buildTags({ buyerType: "", region: "" })[1]).toBe("buyer_unknown");
  });

  it("formats as a space-separated string", () => {
    expect(formatTags(buildTags({ decision: "MAYBE", buyerType: "state" }))).toBe(
      "decision_MAYBE buyer_state budget_unknown region_unknown deadline_unknown",
    );
  });
});

describe("oneLiner", () => {
  it("names the buyer and both buckets", () => {
    expect(oneLiner({ buyerOrg: "Legacy Transit Agency", budgetBucket: "enterprise", deadlineBucket: "near_term" })).toBe(
      "Legacy Transit Agency opportunity - enterprise budget, near_term deadline",
    );
  });
});
