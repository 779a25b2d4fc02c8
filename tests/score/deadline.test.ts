import { describe, expect, it } from "vitest";
import { normalizeDeadline } from "../../src/score/deadline";

describe("normalizeDeadline", () => {
  it("passes ISO-prefixed text through unchanged", () => {
    expect(normalizeDeadline("2025-03-04")).toBe("2025-03-04");
    expect(normalizeDeadline("2025-03-04T17:00:00Z")).toBe("2025-03-04T17:00:00Z");
  });

  it("trims surrounding whitespace before passing ISO text through", () => {
    expect(normalizeDeadline("  2025-03-04 17:00 local \n")).toBe("2025-03-04 17:00 local");
  });

  it("reformats US slash dates with zero padding", () => {
    expect(normalizeDeadline("3/4/2025")).toBe("2025-03-04");
    expect(normalizeDeadline("12/31/2025")).toBe("2025-12-31");
    expect(normalizeDeadline("  6/15/2025 at 5pm")).toBe("2025-06-15");
  });

  it("maps long month names case-insensitively", () => {
    expect(normalizeDeadline("March 4, 2025")).toBe("2025-03-04");
    expect(normalizeDeadline("march 4, 2025")).toBe("2025-03-04");
    expect(normalizeDeadline("SEPTEMBER 10, 2026")).toBe("2026-09-10");
  });

  it("treats impossible or unknown parts as unknown", () => {
    expect(normalizeDeadline("13/01/2025")).toBeNull();
    expect(normalizeDeadline("3/32/2025")).toBeNull();
    expect(normalizeDeadline("Smarch 4, 2025")).toBeNull();
    expect(normalizeDeadline("Constructor 4, 2025")).toBeNull();
  });

  it("returns null for text it does not recognize", () => {
    expect(normalizeDeadline("not a date")).toBeNull();
    expect(normalizeDeadline("March 2025")).toBeNull();
    expect(normalizeDeadline("4 March 2025")).toBeNull();
    expect(normalizeDeadline("")).toBeNull();
    expect(normalizeDeadline(undefined)).toBeNull();
    expect(normalizeDeadline(null)).toBeNull();
  });
});
