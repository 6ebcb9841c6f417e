import { Command } from "@effect/cli";
import { Console, Effect, Logger } from "effect";

import { makeClients } from "~/aws";
import type { DeployOptions } from "~/config";
import { deployDryRun, deployRemote, type DeployResult } from "~/deploy/deploy";
import { describeError } from "~/errors";
import { c } from "~/cli/colors";
import {
  dryRunOption,
  enrichmentTableNameOption,
  inputOption,
  outputOption,
  regionOption,
  resolveDryRunDir,
  resolveInputDir,
  skipEnrichmentRulesOption,
  skipRulesOption,
  tableNameOption,
  verboseOption
} from "~/cli/config";
import { resolveLogLevel } from "~/cli/log-level";

const RULE = "=".repeat(60);

const printSummary = (result: DeployResult, region: string) =>
  Effect.gen(function* () {
    const dryRun = result.mode === "dry-run";

    yield* Console.log(`\n${RULE}`);
    yield* Console.log(c.bold(dryRun ? "DRY RUN SUMMARY" : "DEPLOYMENT SUMMARY"));
    yield* Console.log(RULE);
    yield* Console.log(`Client ID: ${c.cyan(result.clientId)}`);
    yield* Console.log(`Client Tag: ${result.clientTag}`);
    yield* Console.log(`Region: ${region}`);
    yield* Console.log(`Environments processed: ${result.environments.length}`);
    for (const { key, envId } of result.environments) {
      yield* Console.log(`  ${key}: ${c.dim(envId)}`);
    }
    yield* Console.log(`Parameters: ${result.parameters}`);

    if (result.pipelines !== undefined && result.downloadRules !== undefined) {
      yield* Console.log(`Pipelines with rule sets: ${result.pipelines}`);
      yield* Console.log(`Download rules: ${result.downloadRules}`);
    } else {
      yield* Console.log(c.yellow("Download rules skipped"));
    }
    if (result.enrichmentRules !== undefined) {
      yield* Console.log(`Enrichment rules: ${result.enrichmentRules}`);
    }

    if (result.mode === "dry-run") {
      yield* Console.log(`\nAll generated payloads saved to: ${c.cyan(result.outputDir)}`);
      for (const file of result.files) {
        yield* Console.log(`  ${c.dim(file)}`);
      }
      yield* Console.log("Review these files before running without --dry-run");
    }

    yield* Console.log(c.green(dryRun ? "\nDry run completed!" : "\nDeployment completed!"));
  });

export const deployCommand = Command.make(
  "deploy-master",
  {
    input: inputOption,
    tableName: tableNameOption,
    enrichmentTableName: enrichmentTableNameOption,
    region: regionOption,
    dryRun: dryRunOption,
    skipRules: skipRulesOption,
    skipEnrichmentRules: skipEnrichmentRulesOption,
    output: outputOption,
    verbose: verboseOption
  },
  ({ input, tableName, enrichmentTableName, region, dryRun, skipRules, skipEnrichmentRules, output, verbose }) =>
    Effect.gen(function* () {
      const cwd = process.cwd();
      const options: DeployOptions = {
        inputDir: resolveInputDir(input, cwd),
        tableName,
        enrichmentTableName,
        skipRules,
        skipEnrichmentRules
      };

      yield* Console.log(c.bold("Starting master deployment"));
      yield* Console.log(`Input Directory: ${options.inputDir}`);
      yield* Console.log(`DynamoDB Table: ${tableName}`);
      yield* Console.log(`Enrichment Rule Table: ${enrichmentTableName}`);
      yield* Console.log(`Region: ${region}`);

      const result: DeployResult = dryRun
        ? yield* Effect.gen(function* () {
          const outputDir = resolveDryRunDir(output, cwd, new Date());
          yield* Console.log(c.yellow(`DRY RUN MODE: no changes will be made, outputs go to ${outputDir}`));
          return yield* deployDryRun(options, outputDir);
        })
        : yield* deployRemote(options).pipe(
          Effect.provide(makeClients({ region }))
        );

      yield* printSummary(result, region);
    }).pipe(
      Effect.tapError(error => Console.error(c.red(`\nError: ${describeError(error)}`))),
      Logger.withMinimumLogLevel(resolveLogLevel(verbose, process.env.LOG_LEVEL))
    )
).pipe(Command.withDescription("Deploy client configuration, download rules and enrichment rules"));
