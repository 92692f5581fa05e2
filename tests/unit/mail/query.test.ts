import { describe, it, expect } from "vitest";
import { buildUnreadQuery, windowStart } from "../../../src/mail/query.js";

describe("windowStart", () => {
  const now = new Date(2026, 9, 19, 15, 30, 12);

  it("is local midnight today for days = 0", () => {
    expect(windowStart(0, now)).toEqual(new Date(2026, 9, 19));
  });

  it("goes back whole days", () => {
    expect(windowStart(1, now)).toEqual(new Date(2026, 9, 18));
    expect(windowStart(7, now)).toEqual(new Date(2026, 9, 12));
  });

  it("crosses month boundaries", () => {
    expect(windowStart(20, now)).toEqual(new Date(2026, 8, 29));
  });

  it("rejects negative or fractional days", () => {
    expect(() => windowStart(-1, now)).toThrow(RangeError);
    expect(() => windowStart(1.5, now)).toThrow(RangeError);
  });
});

describe("buildUnreadQuery", () => {
  it("filters unread messages after the window start in epoch seconds", () => {
    const start = new Date(Date.UTC(2026, 9, 18, 0, 0, 0));
    expect(buildUnreadQuery(start)).toBe("is:unread after:1792281600");
  });
});
