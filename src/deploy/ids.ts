import { Effect } from "effect";
import { createHash } from "crypto";

import { IdCollisionError } from "~/errors";
import type { ClientDocument, EnvironmentsDocument } from "./schema";

/**
 * Hex characters kept from the SHA-256 digest (64 bits).
 */
export const ID_HASH_LENGTH = 16;

export const hashSeed = (...fields: ReadonlyArray<string>): string =>
  createHash("sha256")
    .update(fields.join("\u0000"))
    .digest("hex")
    .slice(0, ID_HASH_LENGTH);

/**
 * Build an identifier such as `acme-cid-1f2e3d4c5b6a7980`.
 * `kindTag` is `cid`, `con`, `pipe`, or the environment tag.
 */
export const generateId = (prefixTag: string, kindTag: string, seed: string): string =>
  `${prefixTag}-${kindTag}-${seed}`;

// ============ ID index ============

export type EnvironmentIds = {
  key: string;
  tag: string;
  envId: string;
  /** connection key → connection id */
  connections: ReadonlyMap<string, string>;
  /** pipeline key → pipeline id */
  pipelines: ReadonlyMap<string, string>;
};

export type IdIndex = {
  clientId: string;
  clientTag: string;
  environments: ReadonlyArray<EnvironmentIds>;
};

/**
 * Tracks which entity owns each generated id; registering an id owned by a
 * different entity fails.
 */
export const makeIdRegistry = () => {
  const owners = new Map<string, string>();
  return (id: string, owner: string) =>
    Effect.gen(function* () {
      const existing = owners.get(id);
      if (existing !== undefined && existing !== owner) {
        return yield* Effect.fail(new IdCollisionError({ id, first: existing, second: owner }));
      }
      owners.set(id, owner);
      return id;
    });
};

/**
 * Derive ids for the client and every environment, connection and pipeline.
 * Each id is seeded by its parent id and its own key, so the same key in two
 * environments yields two ids, and unchanged input always yields the same ids.
 */
export const generateIds = (client: ClientDocument, environments: EnvironmentsDocument) =>
  Effect.gen(function* () {
    const register = makeIdRegistry();
    const clientTag = client.tag;

    const clientId = yield* register(
      generateId(clientTag, "cid", hashSeed("client", clientTag, client.name)),
      "client"
    );

    const envIds: EnvironmentIds[] = [];
    for (const [envKey, environment] of Object.entries(environments)) {
      const envId = yield* register(
        generateId(clientTag, environment.tag, hashSeed("environment", clientId, envKey, environment.tag)),
        `environment '${envKey}'`
      );

      const connections = new Map<string, string>();
      for (const connectionKey of Object.keys(environment.connections ?? {})) {
        connections.set(connectionKey, yield* register(
          generateId(clientTag, "con", hashSeed("connection", envId, connectionKey)),
          `connection '${envKey}/${connectionKey}'`
        ));
      }

      const pipelines = new Map<string, string>();
      for (const pipelineKey of Object.keys(environment.pipelines ?? {})) {
        pipelines.set(pipelineKey, yield* register(
          generateId(clientTag, "pipe", hashSeed("pipeline", envId, pipelineKey)),
          `pipeline '${envKey}/${pipelineKey}'`
        ));
      }

      envIds.push({ key: envKey, tag: environment.tag, envId, connections, pipelines });
    }

    return { clientId, clientTag, environments: envIds } satisfies IdIndex;
  });
