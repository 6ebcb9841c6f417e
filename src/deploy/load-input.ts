import { Effect, ParseResult, Schema } from "effect";
import * as fs from "fs/promises";
import * as path from "path";

import { INPUT_FILES } from "~/config";
import { ConfigFormatError, ConfigNotFoundError } from "~/errors";
import {
  ClientDocument,
  DownloadRulesDocument,
  EnrichmentRulesDocument,
  EnvironmentsDocument,
  type DownloadRule,
  type EnrichmentRule
} from "./schema";

export type LoadInputOptions = {
  /** Require and read download_rules.json */
  rules: boolean;
  /** Read enrichment_rules.json when present */
  enrichmentRules: boolean;
};

export type LoadedInput = {
  directory: string;
  client: ClientDocument;
  environments: EnvironmentsDocument;
  rules: ReadonlyArray<DownloadRule> | undefined;
  enrichmentRules: ReadonlyArray<EnrichmentRule> | undefined;
};

// ============ Helpers ============

const exists = (target: string) =>
  Effect.promise(() => fs.access(target).then(() => true, () => false));

const formatPath = (segments: ReadonlyArray<PropertyKey>): string =>
  segments.map(String).join(".");

const readJson = (directory: string, file: string) =>
  Effect.gen(function* () {
    const fullPath = path.join(directory, file);
    const text = yield* Effect.tryPromise({
      try: () => fs.readFile(fullPath, "utf-8"),
      catch: () => new ConfigNotFoundError({ path: fullPath })
    });
    return yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (cause) => new ConfigFormatError({
        file,
        path: "",
        reason: `not valid JSON (${cause instanceof Error ? cause.message : String(cause)})`
      })
    });
  });

const decode = <A, I>(schema: Schema.Schema<A, I, never>, file: string, raw: unknown) =>
  Schema.decodeUnknown(schema)(raw).pipe(
    Effect.mapError((error) => {
      const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error);
      return new ConfigFormatError({
        file,
        path: issue ? formatPath(issue.path) : "",
        reason: issue?.message ?? error.message
      });
    })
  );

const readDocument = <A, I>(directory: string, file: string, schema: Schema.Schema<A, I, never>) =>
  readJson(directory, file).pipe(
    Effect.flatMap(raw => decode(schema, file, raw))
  );

// Environment tags name dry-run files and seed environment ids.
const ensureUniqueTags = (environments: EnvironmentsDocument) =>
  Effect.gen(function* () {
    const owners = new Map<string, string>();
    for (const [key, environment] of Object.entries(environments)) {
      const owner = owners.get(environment.tag);
      if (owner !== undefined) {
        return yield* Effect.fail(new ConfigFormatError({
          file: INPUT_FILES.environments,
          path: `${key}.tag`,
          reason: `tag '${environment.tag}' is already used by environment '${owner}'`
        }));
      }
      owners.set(environment.tag, key);
    }
  });

// ============ Loader ============

/**
 * Read and validate the JSON documents of a client input directory.
 * Every required file is checked for existence before any is parsed.
 */
export const loadInput = (directory: string, options: LoadInputOptions) =>
  Effect.gen(function* () {
    if (!(yield* exists(directory))) {
      return yield* Effect.fail(new ConfigNotFoundError({ path: directory }));
    }

    const required = [
      INPUT_FILES.client,
      INPUT_FILES.environments,
      ...(options.rules ? [INPUT_FILES.downloadRules] : [])
    ];
    for (const file of required) {
      const fullPath = path.join(directory, file);
      if (!(yield* exists(fullPath))) {
        return yield* Effect.fail(new ConfigNotFoundError({ path: fullPath }));
      }
    }

    yield* Effect.logDebug(`Reading configuration files from ${directory}`);

    const client = yield* readDocument(directory, INPUT_FILES.client, ClientDocument);
    const environments = yield* readDocument(directory, INPUT_FILES.environments, EnvironmentsDocument);
    yield* ensureUniqueTags(environments);

    const rules = options.rules
      ? yield* readDocument(directory, INPUT_FILES.downloadRules, DownloadRulesDocument)
      : undefined;

    let enrichmentRules: ReadonlyArray<EnrichmentRule> | undefined;
    if (options.enrichmentRules) {
      if (yield* exists(path.join(directory, INPUT_FILES.enrichmentRules))) {
        enrichmentRules = yield* readDocument(directory, INPUT_FILES.enrichmentRules, EnrichmentRulesDocument);
      } else {
        yield* Effect.logWarning(`No ${INPUT_FILES.enrichmentRules} in ${directory}, skipping enrichment rules`);
      }
    }

    return {
      directory,
      client,
      environments,
      rules,
      enrichmentRules
    } satisfies LoadedInput;
  });
