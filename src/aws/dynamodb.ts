import { Effect } from "effect";
import { marshall } from "@aws-sdk/util-dynamodb";

import { AWSConnectivityError, AwsRequestError, TableNotFoundError } from "~/errors";
import { DynamoDBClient } from "./clients";

const isResourceNotFound = (error: unknown): boolean =>
  error instanceof Error && error.name === "ResourceNotFoundException";

/**
 * Fail with TableNotFoundError unless the table exists.
 */
export const ensureTableExists = (tableName: string) =>
  Effect.gen(function* () {
    const dynamodb = yield* DynamoDBClient;
    const result = yield* Effect.tryPromise({
      try: () => dynamodb.describeTable({ TableName: tableName }),
      catch: (cause) => isResourceNotFound(cause)
        ? new TableNotFoundError({ table: tableName })
        : new AWSConnectivityError({ service: "dynamodb", cause })
    });
    yield* Effect.logDebug(`Connected to DynamoDB table ${tableName} (${result.Table?.TableStatus ?? "unknown status"})`);
  });

export const putItem = (tableName: string, item: Record<string, unknown>, label: string) =>
  Effect.gen(function* () {
    const dynamodb = yield* DynamoDBClient;
    yield* Effect.tryPromise({
      try: () => dynamodb.putItem({
        TableName: tableName,
        Item: marshall(item, { removeUndefinedValues: true })
      }),
      catch: (cause) => new AwsRequestError({ operation: "PutItem", target: `${tableName}/${label}`, cause })
    });
    yield* Effect.logDebug(`Inserted ${label} into ${tableName}`);
  });
