import { Schema } from "effect";

// Unknown fields are kept on every configuration object: they are part of
// the payload written to Parameter Store.
const Extra = Schema.Record({ key: Schema.String, value: Schema.Unknown });

// ============ client.json ============

export const ClientDocument = Schema.Struct(
  {
    name: Schema.String,
    tag: Schema.String,
  },
  Extra
);
export type ClientDocument = typeof ClientDocument.Type;

// ============ environments.json ============

export const ConnectionDocument = Extra;
export type ConnectionDocument = typeof ConnectionDocument.Type;

export const PipelineDocument = Schema.Struct(
  {
    /** Role (e.g. "source", "target") → connection key in the same environment */
    connections: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.String })),
  },
  Extra
);
export type PipelineDocument = typeof PipelineDocument.Type;

export const EnvironmentDocument = Schema.Struct(
  {
    name: Schema.String,
    tag: Schema.String,
    connections: Schema.optional(Schema.Record({ key: Schema.String, value: ConnectionDocument })),
    pipelines: Schema.optional(Schema.Record({ key: Schema.String, value: PipelineDocument })),
    secret: Schema.optional(Schema.Record({ key: Schema.String, value: Schema.String })),
  },
  Extra
);
export type EnvironmentDocument = typeof EnvironmentDocument.Type;

export const EnvironmentsDocument = Schema.Record({ key: Schema.String, value: EnvironmentDocument });
export type EnvironmentsDocument = typeof EnvironmentsDocument.Type;

// ============ download_rules.json ============

export const DownloadRule = Schema.Struct({
  description: Schema.String,
  type: Schema.String,
  values: Schema.String,
  /** Pipeline key as declared in environments.json */
  pipeline: Schema.String,
  /** Optional environment key restricting which environment's pipeline matches */
  environment: Schema.optional(Schema.String),
});
export type DownloadRule = typeof DownloadRule.Type;

export const DownloadRulesDocument = Schema.Array(DownloadRule);

// ============ enrichment_rules.json ============

// Items may be written either as plain JSON or in DynamoDB attribute form.
export const DynamoString = Schema.Struct({ S: Schema.String });
export const DynamoNumber = Schema.Struct({ N: Schema.String });

export const EnrichmentRule = Schema.Struct({
  environment_id: Schema.Union(Schema.String, DynamoString),
  version: Schema.Union(Schema.Number, Schema.String, DynamoNumber),
  rules_json: Schema.Union(
    Schema.String,
    DynamoString,
    Schema.Array(Schema.Unknown),
    Schema.Record({ key: Schema.String, value: Schema.Unknown })
  ),
  client_id: Schema.optional(Schema.Union(Schema.String, DynamoString)),
});
export type EnrichmentRule = typeof EnrichmentRule.Type;

export const EnrichmentRulesDocument = Schema.Array(EnrichmentRule);
