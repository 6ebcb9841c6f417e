import { Either, Option } from "effect";

import type { ConnectionDocument } from "./schema";

export const SECRET_PREFIX = "secret.";

/**
 * A connection field is either a literal value or a reference to an entry of
 * the environment's secret map, written as `secret.<key>`.
 */
export type FieldValue =
  | { readonly kind: "literal"; readonly value: unknown }
  | { readonly kind: "secret-ref"; readonly key: string };

export type SecretReference = {
  field: string;
  key: string;
};

export type SecretMap = Readonly<Record<string, string>>;

export const parseFieldValue = (value: unknown): FieldValue =>
  typeof value === "string" && value.startsWith(SECRET_PREFIX) && value.length > SECRET_PREFIX.length
    ? { kind: "secret-ref", key: value.slice(SECRET_PREFIX.length) }
    : { kind: "literal", value };

export const lookupSecret = (secrets: SecretMap, key: string): string | undefined =>
  Object.hasOwn(secrets, key) ? secrets[key] : undefined;

/**
 * First reference whose key is missing from `secrets`, if any.
 */
export const findMissingSecret = (
  connection: ConnectionDocument,
  secrets: SecretMap
): Option.Option<SecretReference> => {
  for (const [field, value] of Object.entries(connection)) {
    const parsed = parseFieldValue(value);
    if (parsed.kind === "secret-ref" && lookupSecret(secrets, parsed.key) === undefined) {
      return Option.some({ field, key: parsed.key });
    }
  }
  return Option.none();
};

// Object.fromEntries keeps keys such as `__proto__` as own properties.
const mapFields = (
  connection: ConnectionDocument,
  f: (value: FieldValue) => unknown
): Record<string, unknown> =>
  Object.fromEntries(Object.entries(connection).map(([field, value]) => [field, f(parseFieldValue(value))]));

/**
 * Substitute the plaintext of every secret reference.
 * Fails with the first reference whose key is missing from `secrets`.
 */
export const resolveSecretReferences = (
  connection: ConnectionDocument,
  secrets: SecretMap
): Either.Either<Record<string, unknown>, SecretReference> =>
  Option.match(findMissingSecret(connection, secrets), {
    onSome: missing => Either.left(missing),
    onNone: () => Either.right(mapFields(connection, parsed =>
      parsed.kind === "secret-ref" ? lookupSecret(secrets, parsed.key) : parsed.value
    ))
  });

/**
 * Rewrite every secret reference with `toReference(key)`, typically the
 * parameter path of the secret. Literal fields are copied as is.
 */
export const referenceSecrets = (
  connection: ConnectionDocument,
  toReference: (key: string) => string
): Record<string, unknown> =>
  mapFields(connection, parsed =>
    parsed.kind === "secret-ref" ? toReference(parsed.key) : parsed.value
  );
