/**
 * Helpers reading the environment handed to a plugin. Plugins receive their
 * environment as an explicit record (so tests can inject one) and every
 * reader takes that record as its first argument instead of touching
 * `process.env`.
 */
import type { PluginEnv } from "../types.js";

const TRUE_LITERALS = new Set(["1", "true", "yes", "on"]);
const FALSE_LITERALS = new Set(["0", "false", "no", "off"]);

/** Trims the raw value; blank strings collapse to `undefined`. */
function normaliseEnvValue(raw: string | undefined): string | undefined {
  if (typeof raw !== "string") {
    return undefined;
  }

  const trimmed = raw.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

/**
 * Reads the variable and interprets it as a boolean. Recognises "1", "true",
 * "yes", "on" and "0", "false", "no", "off" case-insensitively and falls back
 * to the default when the variable is absent or ambiguous.
 */
export function readBool(env: PluginEnv, name: string, defaultValue: boolean): boolean {
  return readOptionalBool(env, name) ?? defaultValue;
}

/** Returns an optional boolean if {@link name} is set to a recognised literal. */
export function readOptionalBool(env: PluginEnv, name: string): boolean | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lower = normalised.toLowerCase();
  if (TRUE_LITERALS.has(lower)) {
    return true;
  }
  if (FALSE_LITERALS.has(lower)) {
    return false;
  }
  return undefined;
}

/** Returns the trimmed string when {@link name} is set to a non-empty value. */
export function readOptionalString(env: PluginEnv, name: string): string | undefined {
  return normaliseEnvValue(env[name]);
}

export function readString(env: PluginEnv, name: string, defaultValue: string): string {
  return readOptionalString(env, name) ?? defaultValue;
}

/**
 * Reads a comma-separated list. Entries are trimmed, empty entries dropped and
 * input order preserved. A fresh array is returned on every call.
 */
export function readList(env: PluginEnv, name: string): string[] {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return [];
  }
  return normalised
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Reads an enum-like variable while validating that the literal belongs to the
 * supplied allow-list. Comparison ignores case; the canonical spelling from
 * {@link allowed} is returned.
 */
export function readOptionalEnum<T extends string>(
  env: PluginEnv,
  name: string,
  allowed: readonly T[],
): T | undefined {
  const normalised = normaliseEnvValue(env[name]);
  if (!normalised) {
    return undefined;
  }

  const lookup = new Map<string, T>();
  for (const value of allowed) {
    lookup.set(value.toLowerCase(), value);
  }
  return lookup.get(normalised.toLowerCase());
}
