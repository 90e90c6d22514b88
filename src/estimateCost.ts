import {
  type DocumentNode,
  type FieldNode,
  Kind,
  type OperationDefinitionNode,
  print,
  type SelectionSetNode,
} from "graphql";
import {
  CostComputationError,
  type CostReport,
  type EstimateCostOptions,
  type FieldCostEntry,
  RecursionLimitExceededError,
} from "./types.js";

export const DEFAULT_LIMIT_ARGUMENT = "limit";
export const DEFAULT_MAX_DEPTH = 32;
export const DEFAULT_MAX_NODES = 10000;

export type ResolvedEstimateCostOptions = Required<EstimateCostOptions>;

/**
 * Fill in defaults and reject invalid estimation options
 */
export function resolveEstimateCostOptions(
  options: EstimateCostOptions = {},
): ResolvedEstimateCostOptions {
  const {
    limitArgument = DEFAULT_LIMIT_ARGUMENT,
    maximumDepth = DEFAULT_MAX_DEPTH,
    maximumNodeCount = DEFAULT_MAX_NODES,
  } = options;

  if (limitArgument.length === 0) {
    throw new Error("Invalid limitArgument: must be a non-empty string.");
  }

  if (!Number.isSafeInteger(maximumDepth) || maximumDepth <= 0) {
    throw new Error(
      `Invalid maximumDepth: ${maximumDepth}. Must be a positive integer.`,
    );
  }

  if (!Number.isSafeInteger(maximumNodeCount) || maximumNodeCount <= 0) {
    throw new Error(
      `Invalid maximumNodeCount: ${maximumNodeCount}. Must be a positive integer.`,
    );
  }

  return { limitArgument, maximumDepth, maximumNodeCount };
}

/**
 * Estimate the credit cost of a parsed GraphQL document
 *
 * Every operation is walked depth-first starting from a multiplier of 1.
 * A field's `limit` argument multiplies the cost of everything below it,
 * and each leaf field costs its effective limit plus one credit.
 *
 * @throws {CostComputationError} If a `limit` argument is not a non-negative integer
 * @throws {RecursionLimitExceededError} If an operation exceeds the depth, node or multiplier bounds,
 *   or the total cost leaves the safe integer range
 *
 * @example
 * ```typescript
 * const report = estimateCost(parse("{ items(limit: 5) { id name } }"));
 * // report.totalCost === 12
 * // report.fieldPaths => ["items.id", "items.name"]
 * ```
 */
export function estimateCost(
  document: DocumentNode,
  options: EstimateCostOptions = {},
): CostReport {
  const settings = resolveEstimateCostOptions(options);
  let entries: FieldCostEntry[] = [];

  for (const definition of document.definitions) {
    if (definition.kind === Kind.OPERATION_DEFINITION) {
      entries = entries.concat(collectOperationCosts(definition, settings));
    }
  }

  return buildCostReport(entries);
}

/**
 * Price the leaf fields of a single operation
 */
export function collectOperationCosts(
  operation: OperationDefinitionNode,
  settings: ResolvedEstimateCostOptions,
): FieldCostEntry[] {
  return walkSelectionSet(operation.selectionSet, settings, [], 1, 1, 0)
    .entries;
}

/**
 * @throws {RecursionLimitExceededError} If the total leaves the safe integer range
 */
export function buildCostReport(
  entries: readonly FieldCostEntry[],
): CostReport {
  let totalCost = 0;
  for (const entry of entries) {
    // One credit per returned record plus one for the field itself
    totalCost += entry.effectiveLimit + 1;
    if (!Number.isSafeInteger(totalCost)) {
      throw new RecursionLimitExceededError(
        `Total cost at "${entry.path}" exceeds ${Number.MAX_SAFE_INTEGER}.`,
        "totalCost",
        Number.MAX_SAFE_INTEGER,
        entry.path,
      );
    }
  }

  return {
    totalCost,
    fieldPaths: entries.map((entry) => entry.path),
    entries: [...entries],
  };
}

interface WalkResult {
  entries: FieldCostEntry[];
  nodeCount: number;
}

function walkSelectionSet(
  selectionSet: SelectionSetNode,
  settings: ResolvedEstimateCostOptions,
  parentPath: readonly string[],
  currentLimit: number,
  depth: number,
  currentNodeCount: number,
): WalkResult {
  let entries: FieldCostEntry[] = [];
  let nodeCount = currentNodeCount;

  for (const selection of selectionSet.selections) {
    // Fragments are not priced
    if (selection.kind !== Kind.FIELD) {
      continue;
    }

    const fieldPath = [...parentPath, selection.name.value];
    const path = fieldPath.join(".");

    nodeCount++;
    if (nodeCount > settings.maximumNodeCount) {
      throw new RecursionLimitExceededError(
        `Query exceeds maximum node limit of ${settings.maximumNodeCount} at "${path}".`,
        "nodeCount",
        settings.maximumNodeCount,
        path,
      );
    }

    if (depth > settings.maximumDepth) {
      throw new RecursionLimitExceededError(
        `Query exceeds maximum depth of ${settings.maximumDepth} at "${path}".`,
        "depth",
        settings.maximumDepth,
        path,
      );
    }

    // Computed before the leaf check, so a leaf's own limit scales the leaf
    const childLimit =
      currentLimit * readLimit(selection, settings.limitArgument, path);
    if (!Number.isSafeInteger(childLimit)) {
      throw new RecursionLimitExceededError(
        `Limit multiplier at "${path}" exceeds ${Number.MAX_SAFE_INTEGER}.`,
        "multiplier",
        Number.MAX_SAFE_INTEGER,
        path,
      );
    }

    if (selection.selectionSet) {
      const child = walkSelectionSet(
        selection.selectionSet,
        settings,
        fieldPath,
        childLimit,
        depth + 1,
        nodeCount,
      );
      entries = entries.concat(child.entries);
      nodeCount = child.nodeCount;
    } else {
      entries.push({ path, effectiveLimit: childLimit });
    }
  }

  return { entries, nodeCount };
}

/**
 * Read the multiplier a field applies to its descendants
 */
function readLimit(field: FieldNode, argumentName: string, path: string): number {
  let limit = 1;

  for (const argument of field.arguments ?? []) {
    if (argument.name.value !== argumentName) {
      continue;
    }

    const { value } = argument;
    switch (value.kind) {
      case Kind.INT: {
        const parsed = Number.parseInt(value.value, 10);
        if (!Number.isSafeInteger(parsed) || parsed < 0) {
          throw new CostComputationError(
            `Invalid "${argumentName}" argument on "${path}": expected a non-negative integer, got ${value.value}.`,
            path,
          );
        }
        limit = parsed;
        break;
      }
      case Kind.STRING: {
        const parsed = /^\d+$/.test(value.value)
          ? Number.parseInt(value.value, 10)
          : Number.NaN;
        if (!Number.isSafeInteger(parsed)) {
          throw new CostComputationError(
            `Invalid "${argumentName}" argument on "${path}": expected a non-negative integer, got ${print(value)}.`,
            path,
          );
        }
        limit = parsed;
        break;
      }
      // Unknown until execution
      case Kind.VARIABLE:
      case Kind.NULL:
        limit = 1;
        break;
      default:
        throw new CostComputationError(
          `Invalid "${argumentName}" argument on "${path}": expected a non-negative integer, got ${print(value)}.`,
          path,
        );
    }
  }

  return limit;
}
