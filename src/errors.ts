import * as Data from "effect/Data";

// ============ Input errors ============

export class ConfigNotFoundError
  extends Data.TaggedError("ConfigNotFoundError")<{
    path: string
  }> { }

export class ConfigFormatError
  extends Data.TaggedError("ConfigFormatError")<{
    file: string,
    /** Dotted path of the offending field, empty for document-level problems */
    path: string,
    reason: string
  }> { }

// ============ Reference errors ============

export class UnresolvedSecretReferenceError
  extends Data.TaggedError("UnresolvedSecretReferenceError")<{
    environment: string,
    connection: string,
    field: string,
    secret: string
  }> { }

export class UnresolvedConnectionReferenceError
  extends Data.TaggedError("UnresolvedConnectionReferenceError")<{
    environment: string,
    pipeline: string,
    role: string,
    connection: string
  }> { }

export class UnknownPipelineError
  extends Data.TaggedError("UnknownPipelineError")<{
    pipeline: string,
    ruleIndex: number,
    environment?: string
  }> { }

export class UnknownEnvironmentError
  extends Data.TaggedError("UnknownEnvironmentError")<{
    environment: string,
    ruleIndex: number
  }> { }

export class IdCollisionError
  extends Data.TaggedError("IdCollisionError")<{
    id: string,
    first: string,
    second: string
  }> { }

// ============ AWS and output errors ============

type AwsService = "ssm" | "dynamodb";

export class AWSConnectivityError
  extends Data.TaggedError("AWSConnectivityError")<{
    service: AwsService,
    cause: unknown
  }> { }

export class TableNotFoundError
  extends Data.TaggedError("TableNotFoundError")<{
    table: string
  }> { }

export class AwsRequestError
  extends Data.TaggedError("AwsRequestError")<{
    operation: string,
    target: string,
    cause: unknown
  }> { }

export class OutputWriteError
  extends Data.TaggedError("OutputWriteError")<{
    path: string,
    cause: unknown
  }> { }

export type InputError =
  | ConfigNotFoundError
  | ConfigFormatError;

export type PlanError =
  | InputError
  | UnresolvedSecretReferenceError
  | UnresolvedConnectionReferenceError
  | UnknownPipelineError
  | UnknownEnvironmentError
  | IdCollisionError;

export type DeployError =
  | PlanError
  | AWSConnectivityError
  | TableNotFoundError
  | AwsRequestError
  | OutputWriteError;

const causeMessage = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);

/**
 * Renders a deployment error as a single line naming the offending
 * file, key or rule.
 */
export const describeError = (error: DeployError): string => {
  switch (error._tag) {
    case "ConfigNotFoundError":
      return `Configuration not found: ${error.path}`;
    case "ConfigFormatError":
      return error.path
        ? `Invalid ${error.file} at '${error.path}': ${error.reason}`
        : `Invalid ${error.file}: ${error.reason}`;
    case "UnresolvedSecretReferenceError":
      return `Connection '${error.connection}' in environment '${error.environment}' references unknown secret '${error.secret}' (field '${error.field}')`;
    case "UnresolvedConnectionReferenceError":
      return `Pipeline '${error.pipeline}' in environment '${error.environment}' references unknown connection '${error.connection}' (role '${error.role}')`;
    case "UnknownPipelineError":
      return error.environment
        ? `Download rule ${error.ruleIndex + 1} references pipeline '${error.pipeline}' which is not defined in environment '${error.environment}'`
        : `Download rule ${error.ruleIndex + 1} references pipeline '${error.pipeline}' which is not defined in any environment`;
    case "UnknownEnvironmentError":
      return `Enrichment rule ${error.ruleIndex + 1} references unknown environment '${error.environment}'`;
    case "IdCollisionError":
      return `Generated id '${error.id}' is shared by ${error.first} and ${error.second}`;
    case "AWSConnectivityError":
      return `Unable to connect to AWS ${error.service === "ssm" ? "SSM" : "DynamoDB"}: ${causeMessage(error.cause)}`;
    case "TableNotFoundError":
      return `DynamoDB table '${error.table}' does not exist`;
    case "AwsRequestError":
      return `${error.operation} failed for ${error.target}: ${causeMessage(error.cause)}`;
    case "OutputWriteError":
      return `Unable to write ${error.path}: ${causeMessage(error.cause)}`;
    default:
      return error satisfies never;
  }
};
