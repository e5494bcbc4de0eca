import { closeSync, fsyncSync, openSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { randomUUID } from "node:crypto";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { z, type ZodType, type ZodTypeDef } from "zod";

import { StatePersistenceError } from "../errors.js";

/** Version of the envelope wrapping the plugin state on disk. */
export const STATE_FILE_VERSION = 1;

const StateEnvelopeSchema = z
  .object({
    version: z.literal(STATE_FILE_VERSION),
    savedAt: z.string().min(1),
    state: z.unknown(),
  })
  .strict();

/** Schema describing the state a plugin persists between runs. */
export type StateSchema<TState> = ZodType<TState, ZodTypeDef, unknown>;

export interface StateFileOptions {
  /** Deterministic clock used primarily by tests to fix timestamps. */
  readonly clock?: () => Date;
}

/**
 * Persists the plugin state as a versioned JSON envelope. The payload is
 * written to a temporary sibling which is then renamed over the target, so a
 * concurrent reader sees either the previous file or the new one. The file
 * descriptor is closed on every path.
 *
 * @throws {StatePersistenceError} when the state cannot be serialised or written.
 */
export function writeStateFile<TState>(
  filePath: string,
  state: TState,
  schema?: StateSchema<TState>,
  options: StateFileOptions = {},
): void {
  let serialised: string;
  try {
    const checked = schema ? schema.parse(state) : state;
    serialised = `${JSON.stringify({
      version: STATE_FILE_VERSION,
      savedAt: (options.clock?.() ?? new Date()).toISOString(),
      state: checked,
    })}\n`;
  } catch (error) {
    throw new StatePersistenceError(filePath, "write", error);
  }

  const tempPath = `${filePath}.${randomUUID()}.tmp`;
  try {
    const fd = openSync(tempPath, "w");
    try {
      writeFileSync(fd, serialised, "utf8");
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new StatePersistenceError(filePath, "write", error);
  }
}

/**
 * Restores the plugin state written by {@link writeStateFile}. Returns `null`
 * when no state file exists yet. When a schema is supplied the stored state is
 * validated against it.
 *
 * @throws {StatePersistenceError} when the file is unreadable or malformed.
 */
export function readStateFile<TState>(filePath: string, schema: StateSchema<TState>): TState | null;
export function readStateFile(filePath: string): unknown;
export function readStateFile<TState>(filePath: string, schema?: StateSchema<TState>): unknown {
  let raw: string;
  try {
    const fd = openSync(filePath, "r");
    try {
      raw = readFileSync(fd, { encoding: "utf8" });
    } finally {
      closeSync(fd);
    }
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      return null;
    }
    throw new StatePersistenceError(filePath, "read", error);
  }

  try {
    const envelope = StateEnvelopeSchema.parse(JSON.parse(raw));
    return schema ? schema.parse(envelope.state) : envelope.state;
  } catch (error) {
    throw new StatePersistenceError(filePath, "read", error);
  }
}
