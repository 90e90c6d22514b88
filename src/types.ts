import type { GraphQLError, SourceLocation } from "graphql";

/**
 * A priced leaf field
 */
export interface FieldCostEntry {
  /**
   * Dot-joined field names from the operation root down to the leaf
   */
  readonly path: string;

  /**
   * Product of every `limit` argument on the way to (and including) the leaf
   */
  readonly effectiveLimit: number;
}

/**
 * Result of a cost estimation
 */
export interface CostReport {
  /**
   * Sum of every effective limit plus one credit per leaf field
   */
  readonly totalCost: number;

  /**
   * Leaf paths in traversal order. Duplicates are kept.
   */
  readonly fieldPaths: readonly string[];

  readonly entries: readonly FieldCostEntry[];
}

/**
 * Options for cost estimation
 */
export interface EstimateCostOptions {
  /**
   * Name of the argument that bounds how many records a field returns.
   *
   * @default "limit"
   */
  limitArgument?: string;

  /**
   * Maximum nesting depth of fields in one operation.
   * Root fields sit at depth 1.
   *
   * @default 32
   */
  maximumDepth?: number;

  /**
   * Maximum number of field selections visited in one operation.
   * This is a safeguard against malicious queries that could cause performance issues.
   *
   * @default 10000
   */
  maximumNodeCount?: number;
}

/**
 * Thrown when the query text is not a valid GraphQL document.
 * The message is the parser's own message.
 */
export class QuerySyntaxError extends Error {
  readonly code = "GRAPHQL_PARSE_FAILED";
  readonly locations: readonly SourceLocation[];

  constructor(error: GraphQLError) {
    super(error.message, { cause: error });
    this.name = "QuerySyntaxError";
    this.locations = error.locations ?? [];
  }
}

/**
 * Thrown when a `limit` argument holds a value that is not a
 * non-negative integer.
 */
export class CostComputationError extends Error {
  readonly code = "COST_COMPUTATION_ERROR";

  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "CostComputationError";
  }
}

export type RecursionLimitKind =
  | "depth"
  | "multiplier"
  | "nodeCount"
  | "totalCost";

/**
 * Thrown when a selection tree is too deep or too large, or when a
 * multiplier or the total cost leaves the safe integer range.
 */
export class RecursionLimitExceededError extends Error {
  readonly code = "RECURSION_LIMIT_EXCEEDED";

  constructor(
    message: string,
    public readonly limitKind: RecursionLimitKind,
    public readonly limit: number,
    public readonly path: string,
  ) {
    super(message);
    this.name = "RecursionLimitExceededError";
  }
}
