import { describe, it, expect, vi, beforeEach } from "vitest"
import { Effect, Logger, LogLevel } from "effect"
import { marshall } from "@aws-sdk/util-dynamodb"

const mockSsmConfig = vi.fn();
const mockDescribeParameters = vi.fn();
const mockPutParameter = vi.fn();
const mockDynamoConfig = vi.fn();
const mockDescribeTable = vi.fn();
const mockPutItem = vi.fn();

vi.mock("@aws-sdk/client-ssm", () => ({
  SSM: class {
    constructor(config: unknown) { mockSsmConfig(config); }
    describeParameters = mockDescribeParameters;
    putParameter = mockPutParameter;
  },
}));

vi.mock("@aws-sdk/client-dynamodb", () => ({
  DynamoDB: class {
    constructor(config: unknown) { mockDynamoConfig(config); }
    describeTable = mockDescribeTable;
    putItem = mockPutItem;
  },
}));

import {
  DynamoDBClient,
  SsmClient,
  ensureTableExists,
  makeClients,
  putItem as putItemEffect,
  putParameter as putParameterEffect,
  verifyCredentials
} from "~/aws"

const live = <A, E>(effect: Effect.Effect<A, E, SsmClient | DynamoDBClient>) =>
  effect.pipe(
    Effect.provide(makeClients({ region: "eu-west-1" })),
    Logger.withMinimumLogLevel(LogLevel.None)
  );

const run = <A, E>(effect: Effect.Effect<A, E, SsmClient | DynamoDBClient>) =>
  Effect.runPromise(live(effect));

const fail = <A, E>(effect: Effect.Effect<A, E, SsmClient | DynamoDBClient>) =>
  Effect.runPromise(Effect.flip(live(effect)));

describe("aws clients", () => {

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it("should create both clients for the requested region", async () => {
    mockDescribeParameters.mockResolvedValueOnce({ Parameters: [] });
    mockDescribeTable.mockResolvedValueOnce({ Table: { TableStatus: "ACTIVE" } });

    await run(Effect.zipRight(verifyCredentials(), ensureTableExists("rules")));

    expect(mockSsmConfig).toHaveBeenCalledWith({ region: "eu-west-1" });
    expect(mockDynamoConfig).toHaveBeenCalledWith({ region: "eu-west-1" });
  });

  describe("verifyCredentials", () => {

    it("should make one read-only SSM call", async () => {
      mockDescribeParameters.mockResolvedValueOnce({ Parameters: [] });

      await run(verifyCredentials());

      expect(mockDescribeParameters).toHaveBeenCalledWith({ MaxResults: 1 });
    });

    it("should fail with a connectivity error", async () => {
      mockDescribeParameters.mockRejectedValueOnce(new Error("Could not load credentials from any providers"));

      const error = await fail(verifyCredentials());

      expect(error).toMatchObject({ _tag: "AWSConnectivityError", service: "ssm" });
    });

  });

  describe("putParameter", () => {

    it("should overwrite a plain parameter as String", async () => {
      mockPutParameter.mockResolvedValueOnce({ Version: 2 });

      await run(putParameterEffect({ name: "/a/config", value: "{}", secure: false }));

      expect(mockPutParameter).toHaveBeenCalledWith({
        Name: "/a/config",
        Value: "{}",
        Type: "String",
        Overwrite: true,
      });
    });

    it("should store a secure parameter as SecureString", async () => {
      mockPutParameter.mockResolvedValueOnce({ Version: 1 });

      await run(putParameterEffect({ name: "/a/secrets/pw", value: "s3cr3t", secure: true }));

      expect(mockPutParameter).toHaveBeenCalledWith(expect.objectContaining({ Type: "SecureString" }));
    });

    it("should name the parameter in the failure", async () => {
      mockPutParameter.mockRejectedValueOnce(new Error("Rate exceeded"));

      const error = await fail(putParameterEffect({ name: "/a/config", value: "{}", secure: false }));

      expect(error).toMatchObject({ _tag: "AwsRequestError", operation: "PutParameter", target: "/a/config" });
    });

  });

  describe("ensureTableExists", () => {

    it("should describe the table", async () => {
      mockDescribeTable.mockResolvedValueOnce({ Table: { TableStatus: "ACTIVE" } });

      await run(ensureTableExists("rules"));

      expect(mockDescribeTable).toHaveBeenCalledWith({ TableName: "rules" });
    });

    it("should report a missing table", async () => {
      mockDescribeTable.mockRejectedValueOnce(
        Object.assign(new Error("Requested resource not found"), { name: "ResourceNotFoundException" })
      );

      const error = await fail(ensureTableExists("rules"));

      expect(error).toMatchObject({ _tag: "TableNotFoundError", table: "rules" });
    });

    it("should treat other failures as connectivity errors", async () => {
      mockDescribeTable.mockRejectedValueOnce(new Error("getaddrinfo ENOTFOUND dynamodb.eu-west-1.amazonaws.com"));

      const error = await fail(ensureTableExists("rules"));

      expect(error).toMatchObject({ _tag: "AWSConnectivityError", service: "dynamodb" });
    });

  });

  describe("putItem", () => {

    it("should marshall the item", async () => {
      mockPutItem.mockResolvedValueOnce({});
      const item = { rule_id: "p#rule_1", values: "csv", note: undefined };

      await run(putItemEffect("rules", item, "p#rule_1"));

      expect(mockPutItem).toHaveBeenCalledWith({
        TableName: "rules",
        Item: marshall({ rule_id: "p#rule_1", values: "csv" }),
      });
    });

    it("should name the table and item in the failure", async () => {
      mockPutItem.mockRejectedValueOnce(new Error("Throughput exceeded"));

      const error = await fail(putItemEffect("rules", { rule_id: "p#rule_1" }, "p#rule_1"));

      expect(error).toMatchObject({ _tag: "AwsRequestError", operation: "PutItem", target: "rules/p#rule_1" });
    });

  });

});
