import { Effect } from "effect";
import * as fs from "fs/promises";
import * as path from "path";

import { OutputWriteError } from "~/errors";
import type { DeploymentPlan } from "./plan";

const pad = (value: number) => String(value).padStart(2, "0");

/**
 * Local time as `YYYYMMDD_HHMMSS`, naming one dry-run output directory.
 */
export const formatRunTimestamp = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
  `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;

const safeName = (value: string) => value.replace(/[/\\]/g, "_");

const isAlreadyExists = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "EEXIST";

/**
 * Create a fresh run directory: `outputDir`, or `outputDir_2`, `outputDir_3`...
 * when an earlier run already took the name.
 */
const createRunDirectory = (outputDir: string) =>
  Effect.gen(function* () {
    const parent = path.dirname(outputDir);
    yield* Effect.tryPromise({
      try: () => fs.mkdir(parent, { recursive: true }),
      catch: (cause) => new OutputWriteError({ path: parent, cause })
    });

    for (let attempt = 1; ; attempt++) {
      const candidate = attempt === 1 ? outputDir : `${outputDir}_${attempt}`;
      const created = yield* Effect.tryPromise({
        try: () => fs.mkdir(candidate).then(
          () => true,
          (error: unknown) => isAlreadyExists(error) ? false : Promise.reject(error)
        ),
        catch: (cause) => new OutputWriteError({ path: candidate, cause })
      });
      if (created) return candidate;
      yield* Effect.logDebug(`${candidate} already exists`);
    }
  });

export type DryRunOutput = {
  /** Directory actually written, see createRunDirectory */
  directory: string;
  files: string[];
};

/**
 * Write the payloads of a plan under a new `outputDir` instead of sending
 * them to AWS. Config files hold the exact parameter bodies; secrets and
 * rules are written as indented JSON for review.
 */
export const writeDryRun = (plan: DeploymentPlan, outputDir: string) =>
  Effect.gen(function* () {
    const directory = yield* createRunDirectory(outputDir);

    const files: string[] = [];
    const write = (name: string, body: string) =>
      Effect.gen(function* () {
        const target = path.join(directory, name);
        yield* Effect.tryPromise({
          try: () => fs.writeFile(target, body, "utf-8"),
          catch: (cause) => new OutputWriteError({ path: target, cause })
        });
        files.push(name);
        yield* Effect.logDebug(`Saved ${target}`);
      });

    const secretsByTag = new Map<string, Array<[string, string]>>();
    for (const parameter of plan.parameters) {
      const { source } = parameter;
      switch (source.kind) {
        case "client":
          yield* Effect.logInfo(`Would create client parameter: ${parameter.path}`);
          yield* write("client_config.json", parameter.value);
          break;
        case "environment":
          yield* Effect.logInfo(`Would create environment parameter: ${parameter.path}`);
          yield* write(`environment_${safeName(source.tag)}_config.json`, parameter.value);
          break;
        case "secret": {
          yield* Effect.logInfo(`Would create secret parameter: ${parameter.path}`);
          secretsByTag.set(source.tag, [...(secretsByTag.get(source.tag) ?? []), [source.name, parameter.value]]);
          break;
        }
      }
    }

    for (const [tag, secrets] of secretsByTag) {
      yield* write(`environment_${safeName(tag)}_secrets.json`, JSON.stringify(Object.fromEntries(secrets), null, 2));
    }

    for (const ruleSet of plan.ruleSets ?? []) {
      yield* Effect.logInfo(`Would insert ${ruleSet.rules.length} rule(s) for pipeline ${ruleSet.pipelineKey} (${ruleSet.pipelineId})`);
      yield* write(`rules_${safeName(ruleSet.pipelineId)}.json`, JSON.stringify(ruleSet.rules, null, 2));
    }

    if (plan.enrichmentRules && plan.enrichmentRules.length > 0) {
      yield* Effect.logInfo(`Would insert ${plan.enrichmentRules.length} enrichment rule(s)`);
      yield* write("enrichment_rules.json", JSON.stringify(plan.enrichmentRules, null, 2));
    }

    return { directory, files } satisfies DryRunOutput;
  });
