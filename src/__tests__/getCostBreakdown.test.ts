import { describe, expect, it } from "vitest";
import { getCost, getCostBreakdown } from "../index.js";

describe("getCostBreakdown", () => {
  it("should explain each field's credits", () => {
    const report = getCost({
      query: `
        {
          assets(limit: 10) {
            id
            metrics(limit: 10) {
              createdAt
            }
          }
        }
      `,
    });

    const breakdown = getCostBreakdown(report);

    expect(breakdown.rows).toEqual([
      {
        field: "assets.id",
        calculation: "1 x 10",
        credits: 10,
        result: "10 credits",
      },
      {
        field: "assets.metrics.createdAt",
        calculation: "1 x 100",
        credits: 100,
        result: "100 credits",
      },
    ]);
    expect(breakdown.sumOfCredits).toBe(110);
    expect(breakdown.totalFields).toBe(2);
    expect(breakdown.totalCost).toBe(112);
    expect(breakdown.formula).toBe("110 + 2 = 112");
  });

  it("should describe an empty report", () => {
    const breakdown = getCostBreakdown({
      totalCost: 0,
      fieldPaths: [],
      entries: [],
    });

    expect(breakdown).toEqual({
      rows: [],
      sumOfCredits: 0,
      totalFields: 0,
      totalCost: 0,
      formula: "0 + 0 = 0",
    });
  });
});
