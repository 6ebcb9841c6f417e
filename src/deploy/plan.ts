import { Effect } from "effect";

import type { DeployOptions } from "~/config";
import { buildEnrichmentRules, type EnrichmentRuleRecord } from "./enrichment";
import { generateIds, type IdIndex } from "./ids";
import { loadInput } from "./load-input";
import { buildParameters, type ParameterRecord } from "./parameters";
import { filterRules, type RuleSet } from "./rules";

export type DeployStage =
  | "load"
  | "generate-ids"
  | "build-params"
  | "filter-rules"
  | "build-enrichment"
  | "dry-run-write"
  | "remote-write";

/**
 * Everything a run will write, computed before the first write.
 */
export type DeploymentPlan = {
  ids: IdIndex;
  parameters: ReadonlyArray<ParameterRecord>;
  /** Undefined when download rules are skipped */
  ruleSets: ReadonlyArray<RuleSet> | undefined;
  /** Undefined when enrichment rules are skipped or absent */
  enrichmentRules: ReadonlyArray<EnrichmentRuleRecord> | undefined;
};

export const stage = (name: DeployStage) =>
  <A, E, R>(effect: Effect.Effect<A, E, R>) =>
    Effect.logDebug(`Entering stage ${name}`).pipe(
      Effect.zipRight(effect),
      Effect.annotateLogs("stage", name)
    );

/**
 * Load, generate ids, build parameters, filter rules and build enrichment
 * rules. Every reference is
 * validated here, so a failing plan never leads to a partial write.
 */
export const planDeployment = (options: DeployOptions) =>
  Effect.gen(function* () {
    const input = yield* loadInput(options.inputDir, {
      rules: !options.skipRules,
      enrichmentRules: !options.skipEnrichmentRules
    }).pipe(stage("load"));

    const ids = yield* generateIds(input.client, input.environments).pipe(
      Effect.tap(ids => Effect.logInfo(`Generated client ID: ${ids.clientId}`)),
      Effect.tap(ids => Effect.forEach(ids.environments, env =>
        Effect.logInfo(`Generated environment ID for ${env.key}: ${env.envId}`)
      )),
      stage("generate-ids")
    );

    const parameters = yield* buildParameters(input.client, input.environments, ids).pipe(
      stage("build-params")
    );

    const ruleSets = input.rules
      ? yield* filterRules(input.rules, ids).pipe(stage("filter-rules"))
      : undefined;

    const enrichmentRules = input.enrichmentRules
      ? yield* buildEnrichmentRules(input.enrichmentRules, ids).pipe(stage("build-enrichment"))
      : undefined;

    return {
      ids,
      parameters,
      ruleSets,
      enrichmentRules
    } satisfies DeploymentPlan;
  });
