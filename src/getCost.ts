import type { DocumentNode } from "graphql";
import { estimateCost } from "./estimateCost.js";
import { type ParseQueryOptions, parseQuery } from "./parseQuery.js";
import type { CostReport, EstimateCostOptions } from "./types.js";

/**
 * Options for programmatic cost calculation
 */
export interface GetCostOptions
  extends EstimateCostOptions,
    ParseQueryOptions {
  /**
   * The GraphQL query (as string or DocumentNode)
   */
  query: string | DocumentNode;
}

/**
 * Calculate the credit cost of a GraphQL query
 *
 * Useful for:
 * - Showing consumers what a query will cost before they send it
 * - Budget checks ahead of execution
 * - Logging and analytics
 *
 * @throws {QuerySyntaxError} If the query text cannot be parsed
 * @throws {CostComputationError} If a `limit` argument is not a non-negative integer
 * @throws {RecursionLimitExceededError} If the query is too deep or too large
 *
 * @example
 * ```typescript
 * import { getCost } from 'graphql-credit-cost';
 *
 * const report = getCost({
 *   query: `
 *     {
 *       assets(limit: 10) {
 *         id
 *         metrics(limit: 10) {
 *           createdAt
 *         }
 *       }
 *     }
 *   `,
 * });
 *
 * // assets.id: 10, assets.metrics.createdAt: 100, plus 2 fields
 * console.log('Query cost:', report.totalCost); // 112
 * ```
 */
export function getCost(options: GetCostOptions): CostReport {
  const { maxTokens, noLocation, query, ...estimateOptions } = options;

  const document: DocumentNode =
    typeof query === "string"
      ? parseQuery(query, { maxTokens, noLocation })
      : query;

  return estimateCost(document, estimateOptions);
}
