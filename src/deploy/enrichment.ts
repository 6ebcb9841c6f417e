import { Effect, Schema } from "effect";

import { INPUT_FILES } from "~/config";
import { ConfigFormatError, UnknownEnvironmentError } from "~/errors";
import type { IdIndex } from "./ids";
import { DynamoString, type EnrichmentRule } from "./schema";

/**
 * Item written to the enrichment rule table.
 */
export type EnrichmentRuleRecord = {
  environment_id: string;
  version: number;
  rules_json: string;
  client_id: string;
};

const unwrapString = (value: string | { readonly S: string }): string =>
  typeof value === "string" ? value : value.S;

const isDynamoString = Schema.is(DynamoString);

const parseVersion = (raw: EnrichmentRule["version"], ruleIndex: number): Effect.Effect<number, ConfigFormatError> => {
  const value = typeof raw === "object" ? raw.N : raw;
  const version = typeof value === "number"
    ? value
    : /^-?\d+$/.test(value.trim()) ? Number(value.trim()) : Number.NaN;

  return Number.isSafeInteger(version)
    ? Effect.succeed(version)
    : Effect.fail(new ConfigFormatError({
      file: INPUT_FILES.enrichmentRules,
      path: `${ruleIndex}.version`,
      reason: `version '${String(value)}' is not an integer`
    }));
};

const serializeRules = (raw: EnrichmentRule["rules_json"]): string => {
  if (typeof raw === "string") return raw;
  if (isDynamoString(raw)) return raw.S;
  return JSON.stringify(raw);
};

/**
 * Normalize enrichment rules. `environment_id` may name an environment key
 * (mapped to its generated id) or an already generated environment id;
 * `client_id` defaults to the generated client id.
 */
export const buildEnrichmentRules = (rules: ReadonlyArray<EnrichmentRule>, ids: IdIndex) =>
  Effect.gen(function* () {
    const byKey = new Map(ids.environments.map(env => [env.key, env.envId] as const));
    const knownIds = new Set(ids.environments.map(env => env.envId));

    const records: EnrichmentRuleRecord[] = [];
    for (const [ruleIndex, rule] of rules.entries()) {
      const environment = unwrapString(rule.environment_id);
      const environmentId = byKey.get(environment) ?? (knownIds.has(environment) ? environment : undefined);
      if (environmentId === undefined) {
        return yield* Effect.fail(new UnknownEnvironmentError({ environment, ruleIndex }));
      }

      const clientId = rule.client_id !== undefined ? unwrapString(rule.client_id) : "";

      records.push({
        environment_id: environmentId,
        version: yield* parseVersion(rule.version, ruleIndex),
        rules_json: serializeRules(rule.rules_json),
        client_id: clientId !== "" ? clientId : ids.clientId
      });
    }

    return records;
  });
