import { ApolloServer } from '@apollo/server';
import { startStandaloneServer } from '@apollo/server/standalone';
import { makeExecutableSchema } from '@graphql-tools/schema';
import { GraphQLError } from 'graphql';
import {
  createQueryCostValidator,
  getCost,
  getCostBreakdown,
} from '../../src/index.js';

const maximumCost = 1000;

// Step 1: Define your schema
const typeDefs = `#graphql
  type Query {
    assets(limit: Int): [Asset!]!
  }

  type Asset {
    id: ID!
    slug: String!
    metrics(limit: Int): [Metric!]!
  }

  type Metric {
    defaultValue: Float
    createdAt: String!
  }
`;

// Step 2: Define your resolvers
const resolvers = {
  Query: {
    assets: (_: unknown, { limit }: { limit?: number }) =>
      Array.from({ length: limit ?? 0 }, (_, i) => ({
        id: String(i + 1),
        slug: `asset-${i + 1}`,
      })),
  },
  Asset: {
    metrics: (_: unknown, { limit }: { limit?: number }) =>
      Array.from({ length: limit ?? 0 }, (_, i) => ({
        defaultValue: i,
        createdAt: new Date(0).toISOString(),
      })),
  },
};

// Step 3: Create and start the server
const server = new ApolloServer({
  schema: makeExecutableSchema({ typeDefs, resolvers }),
  // Reject expensive documents during validation
  validationRules: [
    createQueryCostValidator({
      maximumCost,
      onComplete: (report) => console.log(`Query cost: ${report.totalCost}`),
    }),
  ],
  plugins: [
    {
      async requestDidStart() {
        return {
          async didResolveOperation({ document }) {
            const report = getCost({ query: document });

            const { formula } = getCostBreakdown(report);
            console.log(`Credits: ${formula}`);

            if (report.totalCost > maximumCost) {
              throw new GraphQLError(
                `Query exceeds maximum cost of ${maximumCost} credits. Actual: ${report.totalCost}.`,
                {
                  extensions: {
                    code: 'QUERY_TOO_EXPENSIVE',
                    cost: report.totalCost,
                    maximumCost,
                  },
                },
              );
            }
          },
        };
      },
    },
  ],
});

const { url } = await startStandaloneServer(server, {
  listen: { port: 4000 },
});

console.log(`Server ready at: ${url}`);
