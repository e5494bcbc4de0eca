/**
 * Shared types used across the plugin framework. Grouping these definitions
 * keeps the error codes consistent between the graph model, the plugin base
 * class and the entry point.
 */

/**
 * Strongly typed catalogue of stable error codes grouped by feature family.
 * Callers branch on the code rather than on message text.
 */
export const ERROR_CATALOG = {
  FIELD: {
    DUPLICATE: "E-FIELD-DUPLICATE",
    UNKNOWN: "E-FIELD-UNKNOWN",
  },
  FILTER: {
    UNKNOWN: "E-FILTER-UNKNOWN",
  },
  GRAPH: {
    MULTIPLE: "E-GRAPH-MULTIPLE",
    PARENT_UNKNOWN: "E-GRAPH-PARENT-UNKNOWN",
    UNKNOWN: "E-GRAPH-UNKNOWN",
    DUPLICATE: "E-GRAPH-DUPLICATE",
  },
  ATTR: {
    INVALID: "E-ATTR-INVALID",
  },
  COMMAND: {
    UNKNOWN: "E-COMMAND-UNKNOWN",
  },
  STATE: {
    PERSISTENCE: "E-STATE-PERSISTENCE",
  },
} as const;

type ErrorCatalog = typeof ERROR_CATALOG;

/** Utility type used to flatten the nested error catalogue. */
type FlattenCatalog<T extends Record<string, Record<string, string>>> = {
  [Family in keyof T & string as `${Family}_${keyof T[Family] & string}`]: T[Family][keyof T[Family] & string];
};

/** Flattened version of {@link ERROR_CATALOG} used for ergonomic lookups. */
type FlatErrorCatalog = FlattenCatalog<ErrorCatalog>;

function flattenCatalog<T extends Record<string, Record<string, string>>>(
  catalog: T,
): FlattenCatalog<T> {
  const flat: Record<string, string> = {};
  for (const familyKey of Object.keys(catalog) as Array<keyof T & string>) {
    const family = catalog[familyKey];
    for (const codeKey of Object.keys(family) as Array<keyof T[typeof familyKey] & string>) {
      flat[`${familyKey}_${codeKey}`] = family[codeKey];
    }
  }
  return Object.freeze(flat) as FlattenCatalog<T>;
}

/** Flat access to all stable error codes (e.g. `ERROR_CODES.FIELD_UNKNOWN`). */
export const ERROR_CODES: FlatErrorCatalog = flattenCatalog(ERROR_CATALOG);

/** Union type representing every stable error code raised by the framework. */
export type ErrorCode = FlatErrorCatalog[keyof FlatErrorCatalog];

/** Environment record handed to plugins. Mirrors the shape of `process.env`. */
export type PluginEnv = Readonly<Record<string, string | undefined>>;
