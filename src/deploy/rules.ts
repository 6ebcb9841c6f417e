import { Effect } from "effect";

import { UnknownPipelineError } from "~/errors";
import type { IdIndex } from "./ids";
import type { DownloadRule } from "./schema";

/**
 * Item written to the download rule table.
 */
export type DownloadRuleRecord = {
  rule_id: string;
  env_id: string;
  client_id: string;
  pipeline_id: string;
  description: string;
  type: string;
  values: string;
};

export type RuleSet = {
  environmentKey: string;
  envId: string;
  pipelineKey: string;
  pipelineId: string;
  rules: DownloadRuleRecord[];
};

export const ruleId = (pipelineId: string, position: number) =>
  `${pipelineId}#rule_${position}`;

/**
 * Partition download rules by pipeline.
 *
 * Returns one rule set per pipeline, in environment then pipeline order,
 * including pipelines no rule names. A rule naming a pipeline key matches
 * that key in every environment, unless its `environment` narrows the
 * match to one. The first rule matching no pipeline fails the whole run.
 */
export const filterRules = (rules: ReadonlyArray<DownloadRule>, ids: IdIndex) =>
  Effect.gen(function* () {
    const ruleSets: RuleSet[] = [];
    const byPipelineKey = new Map<string, RuleSet[]>();

    for (const environment of ids.environments) {
      for (const [pipelineKey, pipelineId] of environment.pipelines) {
        const ruleSet: RuleSet = {
          environmentKey: environment.key,
          envId: environment.envId,
          pipelineKey,
          pipelineId,
          rules: []
        };
        ruleSets.push(ruleSet);
        byPipelineKey.set(pipelineKey, [...(byPipelineKey.get(pipelineKey) ?? []), ruleSet]);
      }
    }

    for (const [ruleIndex, rule] of rules.entries()) {
      const targets = (byPipelineKey.get(rule.pipeline) ?? [])
        .filter(ruleSet => rule.environment === undefined || ruleSet.environmentKey === rule.environment);

      if (targets.length === 0) {
        return yield* Effect.fail(new UnknownPipelineError({
          pipeline: rule.pipeline,
          ruleIndex,
          ...(rule.environment !== undefined ? { environment: rule.environment } : {})
        }));
      }

      for (const ruleSet of targets) {
        ruleSet.rules.push({
          rule_id: ruleId(ruleSet.pipelineId, ruleSet.rules.length + 1),
          env_id: ruleSet.envId,
          client_id: ids.clientId,
          pipeline_id: ruleSet.pipelineId,
          description: rule.description,
          type: rule.type,
          values: rule.values
        });
      }
    }

    for (const ruleSet of ruleSets) {
      yield* Effect.logDebug(`Pipeline ${ruleSet.pipelineKey} (${ruleSet.pipelineId}): ${ruleSet.rules.length} rule(s)`);
    }

    return ruleSets;
  });
