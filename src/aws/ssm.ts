import { Effect } from "effect";

import { AWSConnectivityError, AwsRequestError } from "~/errors";
import { SsmClient } from "./clients";

export type PutParameterInput = {
  name: string;
  value: string;
  secure: boolean;
};

/**
 * Read-only call proving the credentials and region are usable.
 */
export const verifyCredentials = () =>
  Effect.gen(function* () {
    const ssm = yield* SsmClient;
    yield* Effect.tryPromise({
      try: () => ssm.describeParameters({ MaxResults: 1 }),
      catch: (cause) => new AWSConnectivityError({ service: "ssm", cause })
    });
    yield* Effect.logDebug("AWS credentials verified");
  });

/**
 * Create or overwrite a parameter. Secure parameters are stored as
 * SecureString; their values never reach the log.
 */
export const putParameter = ({ name, value, secure }: PutParameterInput) =>
  Effect.gen(function* () {
    const ssm = yield* SsmClient;
    const type = secure ? "SecureString" : "String";

    yield* Effect.logDebug(`Creating ${type} parameter: ${name}`);
    yield* Effect.tryPromise({
      try: () => ssm.putParameter({
        Name: name,
        Value: value,
        Type: type,
        Overwrite: true
      }),
      catch: (cause) => new AwsRequestError({ operation: "PutParameter", target: name, cause })
    });
  });
