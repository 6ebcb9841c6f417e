import { Effect, Option } from "effect";

import { PARAMETER_ROOT } from "~/config";
import { UnresolvedConnectionReferenceError, UnresolvedSecretReferenceError } from "~/errors";
import type { EnvironmentIds, IdIndex } from "./ids";
import type { ClientDocument, EnvironmentDocument, EnvironmentsDocument } from "./schema";
import { findMissingSecret, referenceSecrets } from "./secrets";

export type ParameterSource =
  | { kind: "client" }
  | { kind: "environment"; environment: string; tag: string }
  | { kind: "secret"; environment: string; tag: string; name: string };

export type ParameterRecord = {
  path: string;
  value: string;
  /** Written as SecureString */
  secure: boolean;
  source: ParameterSource;
};

// ============ Paths ============

export const clientConfigPath = (clientId: string) =>
  `${PARAMETER_ROOT}/clients/${clientId}/config`;

const environmentRoot = (clientId: string, envId: string) =>
  `${PARAMETER_ROOT}/clients/${clientId}/envs/${envId}`;

export const environmentConfigPath = (clientId: string, envId: string) =>
  `${environmentRoot(clientId, envId)}/config`;

export const secretPath = (clientId: string, envId: string, secretName: string) =>
  `${environmentRoot(clientId, envId)}/secrets/${secretName}`;

// Ids are generated from the same documents, so a miss here is a defect.
const lookup = <V>(map: ReadonlyMap<string, V>, key: string) =>
  Effect.fromNullable(map.get(key)).pipe(Effect.orDie);

// ============ Environment config ============

const buildConnections = (clientId: string, environment: EnvironmentDocument, ids: EnvironmentIds) =>
  Effect.gen(function* () {
    const secrets = environment.secret ?? {};
    const connections: Record<string, unknown> = {};

    for (const [connectionKey, connection] of Object.entries(environment.connections ?? {})) {
      const connectionId = yield* lookup(ids.connections, connectionKey);

      const missing = findMissingSecret(connection, secrets);
      if (Option.isSome(missing)) {
        return yield* Effect.fail(new UnresolvedSecretReferenceError({
          environment: ids.key,
          connection: connectionKey,
          field: missing.value.field,
          secret: missing.value.key
        }));
      }

      connections[connectionId] = {
        ...referenceSecrets(connection, secretName => secretPath(clientId, ids.envId, secretName)),
        id: connectionId
      };
    }

    return connections;
  });

const buildPipelines = (environment: EnvironmentDocument, ids: EnvironmentIds) =>
  Effect.gen(function* () {
    const pipelines: Record<string, unknown> = {};

    for (const [pipelineKey, pipeline] of Object.entries(environment.pipelines ?? {})) {
      const pipelineId = yield* lookup(ids.pipelines, pipelineKey);

      const roles: Array<[string, string]> = [];
      for (const [role, connectionKey] of Object.entries(pipeline.connections ?? {})) {
        const connectionId = ids.connections.get(connectionKey);
        if (connectionId === undefined) {
          return yield* Effect.fail(new UnresolvedConnectionReferenceError({
            environment: ids.key,
            pipeline: pipelineKey,
            role,
            connection: connectionKey
          }));
        }
        roles.push([role, connectionId]);
      }

      pipelines[pipelineId] = {
        ...pipeline,
        id: pipelineId,
        ...(pipeline.connections ? { connections: Object.fromEntries(roles) } : {})
      };
    }

    return pipelines;
  });

const buildEnvironmentConfig = (clientId: string, environment: EnvironmentDocument, ids: EnvironmentIds) =>
  Effect.gen(function* () {
    const connections = yield* buildConnections(clientId, environment, ids);
    const pipelines = yield* buildPipelines(environment, ids);

    const { secret: _secret, ...rest } = environment;
    return {
      ...rest,
      id: ids.envId,
      ...(environment.connections ? { connections } : {}),
      ...(environment.pipelines ? { pipelines } : {})
    };
  });

// ============ Builder ============

/**
 * Expand the configuration into parameter records: the client config, then
 * for each environment its config followed by one SecureString per secret.
 * Config bodies carry secret parameter paths, never secret values.
 */
export const buildParameters = (client: ClientDocument, environments: EnvironmentsDocument, ids: IdIndex) =>
  Effect.gen(function* () {
    const { clientId } = ids;
    const records: ParameterRecord[] = [{
      path: clientConfigPath(clientId),
      value: JSON.stringify({ ...client, id: clientId }),
      secure: false,
      source: { kind: "client" }
    }];

    for (const envIds of ids.environments) {
      const environment = environments[envIds.key];
      if (!environment) {
        return yield* Effect.dieMessage(`Environment '${envIds.key}' has ids but no document`);
      }

      const config = yield* buildEnvironmentConfig(clientId, environment, envIds);
      records.push({
        path: environmentConfigPath(clientId, envIds.envId),
        value: JSON.stringify(config),
        secure: false,
        source: { kind: "environment", environment: envIds.key, tag: envIds.tag }
      });

      for (const [name, value] of Object.entries(environment.secret ?? {})) {
        records.push({
          path: secretPath(clientId, envIds.envId, name),
          value,
          secure: true,
          source: { kind: "secret", environment: envIds.key, tag: envIds.tag, name }
        });
      }
    }

    return records;
  });
