/**
 * GraphQL Credit Cost Estimation
 *
 * Statically estimates how many credits a GraphQL query will consume,
 * scaling leaf fields by the `limit` arguments above them.
 *
 * @packageDocumentation
 */

export {
  DEFAULT_LIMIT_ARGUMENT,
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_NODES,
  estimateCost,
} from "./estimateCost.js";
export { type GetCostOptions, getCost } from "./getCost.js";
export {
  type CostBreakdown,
  type CostBreakdownRow,
  getCostBreakdown,
} from "./getCostBreakdown.js";
export { type ParseQueryOptions, parseQuery } from "./parseQuery.js";
export { createQueryCostValidator, type QueryCostOptions } from "./QueryCost.js";
export {
  CostComputationError,
  type CostReport,
  type EstimateCostOptions,
  type FieldCostEntry,
  QuerySyntaxError,
  type RecursionLimitKind,
  RecursionLimitExceededError,
} from "./types.js";
