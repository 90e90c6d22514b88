import { type DocumentNode, GraphQLError, parse } from "graphql";
import { QuerySyntaxError } from "./types.js";

export interface ParseQueryOptions {
  /**
   * Upper bound on the number of tokens the lexer reads before giving up.
   */
  maxTokens?: number;

  /**
   * Skip attaching source locations to AST nodes
   */
  noLocation?: boolean;
}

/**
 * Parse query text into a GraphQL document
 *
 * @throws {QuerySyntaxError} If the text is not a valid GraphQL document
 */
export function parseQuery(
  query: string,
  options: ParseQueryOptions = {},
): DocumentNode {
  try {
    return parse(query, options);
  } catch (error) {
    if (error instanceof GraphQLError) {
      throw new QuerySyntaxError(error);
    }
    throw error;
  }
}
