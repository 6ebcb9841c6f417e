import { Effect } from "effect";

import { ensureTableExists, putItem, putParameter, verifyCredentials } from "~/aws";
import type { DeployOptions } from "~/config";
import type { DeploymentPlan } from "./plan";

export type RemoteWriteResult = {
  parameters: number;
  downloadRules: number;
  enrichmentRules: number;
};

/**
 * Apply a plan to AWS: preflight checks first, then every parameter, then
 * every download rule, then every enrichment rule, one call at a time.
 * All writes are idempotent puts, so a failed run can be repeated as is.
 */
export const writeRemote = (
  plan: DeploymentPlan,
  options: Pick<DeployOptions, "tableName" | "enrichmentTableName">
) =>
  Effect.gen(function* () {
    yield* verifyCredentials();
    if (plan.ruleSets) {
      yield* ensureTableExists(options.tableName);
    }
    if (plan.enrichmentRules && plan.enrichmentRules.length > 0) {
      yield* ensureTableExists(options.enrichmentTableName);
    }

    for (const parameter of plan.parameters) {
      yield* putParameter({ name: parameter.path, value: parameter.value, secure: parameter.secure });
    }
    yield* Effect.logInfo(`Wrote ${plan.parameters.length} parameter(s)`);

    let downloadRules = 0;
    for (const ruleSet of plan.ruleSets ?? []) {
      for (const rule of ruleSet.rules) {
        yield* putItem(options.tableName, rule, rule.rule_id);
        downloadRules++;
      }
    }
    if (plan.ruleSets) {
      yield* Effect.logInfo(`Inserted ${downloadRules} download rule(s) into ${options.tableName}`);
    }

    let enrichmentRules = 0;
    for (const rule of plan.enrichmentRules ?? []) {
      yield* putItem(options.enrichmentTableName, rule, `${rule.environment_id}@v${rule.version}`);
      enrichmentRules++;
    }
    if (plan.enrichmentRules) {
      yield* Effect.logInfo(`Inserted ${enrichmentRules} enrichment rule(s) into ${options.enrichmentTableName}`);
    }

    return {
      parameters: plan.parameters.length,
      downloadRules,
      enrichmentRules
    } satisfies RemoteWriteResult;
  });
