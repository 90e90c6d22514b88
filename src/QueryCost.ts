import {
  type ASTVisitor,
  GraphQLError,
  type OperationDefinitionNode,
  type ValidationContext,
} from "graphql";
import {
  buildCostReport,
  collectOperationCosts,
  resolveEstimateCostOptions,
} from "./estimateCost.js";
import {
  CostComputationError,
  type CostReport,
  type EstimateCostOptions,
  type FieldCostEntry,
  RecursionLimitExceededError,
} from "./types.js";

/**
 * Options for query cost validation
 */
export interface QueryCostOptions extends EstimateCostOptions {
  /**
   * Maximum allowed cost in credits
   */
  maximumCost: number;

  /**
   * Optional callback invoked when cost calculation completes
   * Useful for logging and monitoring
   *
   * Not called when the document was rejected.
   */
  onComplete?: (report: CostReport) => void;
}

/**
 * Creates a validation rule that rejects documents costing more than
 * `maximumCost` credits
 *
 * @example
 * ```typescript
 * import { validate, specifiedRules } from 'graphql';
 * import { createQueryCostValidator } from 'graphql-credit-cost';
 *
 * const costRule = createQueryCostValidator({
 *   maximumCost: 1000,
 *   onComplete: (report) => console.log('Query cost:', report.totalCost),
 * });
 *
 * const errors = validate(schema, documentAST, [...specifiedRules, costRule]);
 * ```
 */
export function createQueryCostValidator(
  options: QueryCostOptions,
): (context: ValidationContext) => ASTVisitor {
  const { maximumCost, onComplete, ...estimateOptions } = options;

  if (!Number.isFinite(maximumCost) || maximumCost <= 0) {
    throw new Error(
      `Invalid maximumCost: ${maximumCost}. Must be a positive finite number.`,
    );
  }

  const settings = resolveEstimateCostOptions(estimateOptions);

  return (context: ValidationContext): ASTVisitor => {
    let entries: FieldCostEntry[] = [];
    let hasReportedError = false;

    const reportEstimationError = (
      error: unknown,
      operation?: OperationDefinitionNode,
    ) => {
      if (
        error instanceof CostComputationError ||
        error instanceof RecursionLimitExceededError
      ) {
        hasReportedError = true;
        context.reportError(
          new GraphQLError(error.message, {
            extensions: { code: error.code, path: error.path },
            nodes: operation,
            originalError: error,
          }),
        );
        return;
      }
      throw error;
    };

    return {
      OperationDefinition(operation: OperationDefinitionNode) {
        try {
          entries = entries.concat(collectOperationCosts(operation, settings));
        } catch (error) {
          reportEstimationError(error, operation);
        }

        // Return false to prevent the visitor from traversing child nodes again
        return false;
      },

      Document: {
        leave() {
          if (hasReportedError) {
            return;
          }

          let report: CostReport;
          try {
            report = buildCostReport(entries);
          } catch (error) {
            reportEstimationError(error);
            return;
          }

          if (report.totalCost > maximumCost) {
            hasReportedError = true;
            context.reportError(
              new GraphQLError(
                `Query exceeds maximum cost of ${maximumCost} credits. Estimated cost is ${report.totalCost} credits.`,
                {
                  extensions: {
                    code: "QUERY_TOO_EXPENSIVE",
                    cost: report.totalCost,
                    maximumCost,
                  },
                },
              ),
            );
            return;
          }

          onComplete?.(report);
        },
      },
    };
  };
}
