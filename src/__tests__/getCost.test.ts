import { GraphQLError, Kind, parse } from "graphql";
import { describe, expect, it } from "vitest";
import {
  CostComputationError,
  getCost,
  parseQuery,
  QuerySyntaxError,
} from "../index.js";

describe("parseQuery", () => {
  it("should parse a query into a document", () => {
    const document = parseQuery("{ items(limit: 5) { id } }");

    expect(document.kind).toBe(Kind.DOCUMENT);
    expect(document.definitions).toHaveLength(1);
  });

  it("should wrap syntax errors", () => {
    let caught: unknown;
    try {
      parseQuery("{ items { id }");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(QuerySyntaxError);
    if (!(caught instanceof QuerySyntaxError)) {
      return;
    }
    expect(caught.name).toBe("QuerySyntaxError");
    expect(caught.code).toBe("GRAPHQL_PARSE_FAILED");
    expect(caught.message).toMatch(/^Syntax Error:/);
    expect(caught.cause).toBeInstanceOf(GraphQLError);
    expect(caught.cause).toMatchObject({ message: caught.message });
    expect(caught.locations).toHaveLength(1);
  });

  it("should attach locations by default", () => {
    expect(parseQuery("{ a }").loc).toBeDefined();
  });

  it("should omit locations with noLocation", () => {
    const document = parseQuery("{ a }", { noLocation: true });

    expect(document.loc).toBeUndefined();
  });

  it("should stop after maxTokens", () => {
    expect(() => parseQuery("{ a b c d e }", { maxTokens: 3 })).toThrow(
      QuerySyntaxError,
    );
    expect(() => parseQuery("{ a b c d e }", { maxTokens: 100 })).not.toThrow();
  });
});

describe("getCost", () => {
  it("should calculate cost from a query string", () => {
    const report = getCost({
      query: `
        query {
          items(limit: 5) {
            id
            name
          }
        }
      `,
    });

    // 5 + 5 + 2 fields = 12
    expect(report.totalCost).toBe(12);
    expect(report.fieldPaths).toEqual(["items.id", "items.name"]);
  });

  it("should accept DocumentNode as query", () => {
    const document = parse("{ a(limit: 10) { b(limit: 3) { c } } }");

    const report = getCost({ query: document });

    expect(report.totalCost).toBe(31);
  });

  it("should pass estimation options through", () => {
    const report = getCost({
      query: "{ users(first: 20) { id } }",
      limitArgument: "first",
    });

    expect(report.totalCost).toBe(21);
  });

  it("should throw a syntax error for malformed queries", () => {
    expect(() => getCost({ query: "{ items(limit: 5) { id }" })).toThrow(
      QuerySyntaxError,
    );
  });

  it("should throw a cost computation error for bad limits", () => {
    expect(() => getCost({ query: "{ items(limit: true) { id } }" })).toThrow(
      CostComputationError,
    );
  });

  it("should pass noLocation to the parser", () => {
    const report = getCost({ query: "{ items(limit: 2) { id } }", noLocation: true });

    expect(report.totalCost).toBe(3);
  });

  it("should honour maxTokens", () => {
    expect(() => getCost({ query: "{ a b c d e }", maxTokens: 3 })).toThrow(
      QuerySyntaxError,
    );
  });
});
