import type { CostReport } from "./types.js";

export interface CostBreakdownRow {
  /** Leaf field path */
  field: string;
  /** How often the field is returned, e.g. `"1 x 10"` */
  calculation: string;
  credits: number;
  /** e.g. `"10 credits"` */
  result: string;
}

export interface CostBreakdown {
  rows: CostBreakdownRow[];
  sumOfCredits: number;
  totalFields: number;
  totalCost: number;
  /** `"<sumOfCredits> + <totalFields> = <totalCost>"` */
  formula: string;
}

/**
 * Explain how a report's total is made up, one row per leaf field.
 */
export function getCostBreakdown(report: CostReport): CostBreakdown {
  const rows = report.entries.map(
    ({ effectiveLimit, path }): CostBreakdownRow => ({
      field: path,
      calculation: `1 x ${effectiveLimit}`,
      credits: effectiveLimit,
      result: `${effectiveLimit} credits`,
    }),
  );

  const sumOfCredits = rows.reduce((sum, row) => sum + row.credits, 0);
  const totalFields = rows.length;

  return {
    rows,
    sumOfCredits,
    totalFields,
    totalCost: report.totalCost,
    formula: `${sumOfCredits} + ${totalFields} = ${report.totalCost}`,
  };
}
