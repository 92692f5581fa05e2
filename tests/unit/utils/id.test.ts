import { describe, it, expect } from "vitest";
import { generateRunId } from "../../../src/utils/id.js";

describe("generateRunId", () => {
  it("returns a string in the expected format (base36-hex)", () => {
    expect(generateRunId()).toMatch(/^[a-z0-9]+-[a-f0-9]{8}$/);
  });

  it("generates unique IDs", () => {
    const ids = new Set<string>();
    for (let i = 0; i < 1000; i++) {
      ids.add(generateRunId());
    }
    expect(ids.size).toBe(1000);
  });

  it("is time-sortable", () => {
    const [time1 = ""] = generateRunId().split("-");
    const [time2 = ""] = generateRunId().split("-");

    expect(parseInt(time2, 36)).toBeGreaterThanOrEqual(parseInt(time1, 36));
  });
});
