import { Effect } from "effect";

import type { DeployOptions } from "~/config";
import { writeDryRun } from "./dry-run";
import { planDeployment, stage, type DeploymentPlan } from "./plan";
import { writeRemote } from "./remote";

// ============ Results ============

export type DeploymentSummary = {
  clientId: string;
  clientTag: string;
  environments: ReadonlyArray<{ key: string; envId: string }>;
  parameters: number;
  /** Pipelines that received a rule set; undefined when rules are skipped */
  pipelines: number | undefined;
  downloadRules: number | undefined;
  enrichmentRules: number | undefined;
};

export type DryRunResult = DeploymentSummary & {
  mode: "dry-run";
  outputDir: string;
  files: string[];
};

export type RemoteResult = DeploymentSummary & {
  mode: "remote";
};

export type DeployResult = DryRunResult | RemoteResult;

const summarize = (plan: DeploymentPlan): DeploymentSummary => ({
  clientId: plan.ids.clientId,
  clientTag: plan.ids.clientTag,
  environments: plan.ids.environments.map(({ key, envId }) => ({ key, envId })),
  parameters: plan.parameters.length,
  pipelines: plan.ruleSets?.length,
  downloadRules: plan.ruleSets?.reduce((total, ruleSet) => total + ruleSet.rules.length, 0),
  enrichmentRules: plan.enrichmentRules?.length
});

// ============ Entry points ============

/**
 * Plan the deployment and write its payloads to `outputDir` only. The
 * result names the directory written, which gets a suffix when `outputDir`
 * already exists.
 */
export const deployDryRun = (options: DeployOptions, outputDir: string) =>
  Effect.gen(function* () {
    const plan = yield* planDeployment(options);
    const { directory, files } = yield* writeDryRun(plan, outputDir).pipe(stage("dry-run-write"));

    return {
      ...summarize(plan),
      mode: "dry-run",
      outputDir: directory,
      files
    } satisfies DryRunResult;
  });

/**
 * Plan the deployment and write it to SSM Parameter Store and DynamoDB.
 * Requires the SsmClient and DynamoDBClient services.
 */
export const deployRemote = (options: DeployOptions) =>
  Effect.gen(function* () {
    const plan = yield* planDeployment(options);
    yield* writeRemote(plan, options).pipe(stage("remote-write"));

    return {
      ...summarize(plan),
      mode: "remote"
    } satisfies RemoteResult;
  });
