/**
 * Root of every parameter written to SSM Parameter Store.
 */
export const PARAMETER_ROOT = "/spec/enrichment";

export const DEFAULT_TABLE_NAME = "spec-download-rule";
export const DEFAULT_ENRICHMENT_TABLE_NAME = "spec-enrichment-rule";
export const DEFAULT_REGION = "us-east-1";
export const DEFAULT_DRY_RUN_OUTPUT = ".dev/dry_run_output";

/**
 * File names expected inside a client input directory.
 */
export const INPUT_FILES = {
  client: "client.json",
  environments: "environments.json",
  downloadRules: "download_rules.json",
  enrichmentRules: "enrichment_rules.json",
} as const;

/**
 * Options for a single deployment run.
 *
 * @example
 * ```typescript
 * const options: DeployOptions = {
 *   inputDir: "input/acme",
 *   tableName: "spec-download-rule",
 *   enrichmentTableName: "spec-enrichment-rule",
 *   skipRules: false,
 *   skipEnrichmentRules: false,
 * };
 * ```
 */
export type DeployOptions = {
  /**
   * Directory holding `client.json`, `environments.json`,
   * `download_rules.json` and optionally `enrichment_rules.json`.
   */
  inputDir: string;

  /**
   * DynamoDB table receiving download rules.
   * @default "spec-download-rule"
   */
  tableName: string;

  /**
   * DynamoDB table receiving enrichment rules.
   * @default "spec-enrichment-rule"
   */
  enrichmentTableName: string;

  /**
   * Skip download rules entirely. `download_rules.json` is then neither
   * required nor read, and parameters are still written.
   */
  skipRules: boolean;

  /**
   * Skip enrichment rules even when `enrichment_rules.json` exists.
   */
  skipEnrichmentRules: boolean;
};
