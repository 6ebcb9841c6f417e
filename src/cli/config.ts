import { Options } from "@effect/cli";
import { Either } from "effect";
import * as path from "path";

import {
  DEFAULT_DRY_RUN_OUTPUT,
  DEFAULT_ENRICHMENT_TABLE_NAME,
  DEFAULT_REGION,
  DEFAULT_TABLE_NAME
} from "~/config";
import { formatRunTimestamp } from "~/deploy/dry-run";

/** Input directories named with `--input` live here, relative to the working directory */
export const INPUT_ROOT = "input";

export const inputOption = Options.text("input").pipe(
  Options.withDescription("Name of a subfolder of ./input (e.g. 'newcustomer' for ./input/newcustomer)"),
  Options.orElseEither(
    Options.text("input-dir").pipe(
      Options.withDescription("Full path to the directory containing the configuration files")
    )
  )
);

export const tableNameOption = Options.text("table-name").pipe(
  Options.withDescription("DynamoDB table for download rules"),
  Options.withDefault(DEFAULT_TABLE_NAME)
);

export const enrichmentTableNameOption = Options.text("enrichment-table-name").pipe(
  Options.withDescription("DynamoDB table for enrichment rules"),
  Options.withDefault(DEFAULT_ENRICHMENT_TABLE_NAME)
);

export const regionOption = Options.text("region").pipe(
  Options.withAlias("r"),
  Options.withDescription("AWS region"),
  Options.withDefault(DEFAULT_REGION)
);

export const dryRunOption = Options.boolean("dry-run").pipe(
  Options.withDescription("Write the payloads to local files instead of AWS")
);

export const skipRulesOption = Options.boolean("skip-rules").pipe(
  Options.withDescription("Skip download rules (only create the client configuration)")
);

export const skipEnrichmentRulesOption = Options.boolean("skip-enrichment-rules").pipe(
  Options.withDescription("Skip enrichment rules")
);

export const outputOption = Options.text("output").pipe(
  Options.withAlias("o"),
  Options.withDescription("Base directory for dry-run output; each run gets a timestamped subdirectory"),
  Options.withDefault(DEFAULT_DRY_RUN_OUTPUT)
);

export const verboseOption = Options.boolean("verbose").pipe(
  Options.withAlias("v"),
  Options.withDescription("Enable verbose logging")
);

/**
 * `--input NAME` resolves to `./input/NAME`, `--input-dir PATH` to PATH,
 * both against `cwd`.
 */
export const resolveInputDir = (choice: Either.Either<string, string>, cwd: string): string =>
  Either.match(choice, {
    onLeft: name => path.resolve(cwd, INPUT_ROOT, name),
    onRight: dir => path.resolve(cwd, dir)
  });

export const resolveDryRunDir = (output: string, cwd: string, now: Date): string =>
  path.resolve(cwd, output, formatRunTimestamp(now));
