import { Context, Layer } from "effect";
import {
  SSM,
  type DescribeParametersCommandInput,
  type DescribeParametersCommandOutput,
  type PutParameterCommandInput,
  type PutParameterCommandOutput
} from "@aws-sdk/client-ssm";
import {
  DynamoDB,
  type DescribeTableCommandInput,
  type DescribeTableCommandOutput,
  type PutItemCommandInput,
  type PutItemCommandOutput
} from "@aws-sdk/client-dynamodb";

// Only the calls the deployer makes; tests provide in-process stand-ins.

export type SsmApi = {
  describeParameters: (input: DescribeParametersCommandInput) => Promise<DescribeParametersCommandOutput>;
  putParameter: (input: PutParameterCommandInput) => Promise<PutParameterCommandOutput>;
};

export type DynamoDBApi = {
  describeTable: (input: DescribeTableCommandInput) => Promise<DescribeTableCommandOutput>;
  putItem: (input: PutItemCommandInput) => Promise<PutItemCommandOutput>;
};

export class SsmClient extends Context.Tag("SsmClient")<SsmClient, SsmApi>() { }

export class DynamoDBClient extends Context.Tag("DynamoDBClient")<DynamoDBClient, DynamoDBApi>() { }

export type ClientsConfig = {
  region: string;
};

/**
 * Live SSM and DynamoDB clients for one region.
 */
export const makeClients = ({ region }: ClientsConfig) =>
  Layer.merge(
    Layer.sync(SsmClient, () => {
      const ssm = new SSM({ region });
      return {
        describeParameters: input => ssm.describeParameters(input),
        putParameter: input => ssm.putParameter(input)
      };
    }),
    Layer.sync(DynamoDBClient, () => {
      const dynamodb = new DynamoDB({ region });
      return {
        describeTable: input => dynamodb.describeTable(input),
        putItem: input => dynamodb.putItem(input)
      };
    })
  );
