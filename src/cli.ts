import { realpathSync } from "node:fs";
import process from "node:process";
import { fileURLToPath } from "node:url";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { PluginError } from "./errors.js";
import { StructuredLogger } from "./logger.js";
import type { PluginClass, RunResult } from "./plugin/plugin.js";
import type { PluginEnv } from "./types.js";

export interface PluginMainOptions {
  /** Executable path followed by the arguments. Defaults to `process.argv.slice(1)`. */
  readonly argv?: readonly string[];
  readonly env?: PluginEnv;
  /** Receives the protocol output. Defaults to `process.stdout`. */
  readonly stdout?: (text: string) => void;
  readonly logger?: StructuredLogger;
}

/** Converts a subcommand result into the text written on stdout. */
export function formatRunResult(result: RunResult): string {
  switch (result.command) {
    case "fetch":
    case "config":
      return result.output;
    case "autoconf":
      return result.supported ? "yes\n" : "no\n";
    case "suggest":
      return result.suggestions.map((suggestion) => `${suggestion}\n`).join("");
  }
}

/**
 * Entry point of a plugin executable: builds the plugin, runs the subcommand
 * named by the first argument and writes its output. Resolves with the
 * process exit code (0 on success, 1 when the run failed).
 */
export async function pluginMain(Plugin: PluginClass, options: PluginMainOptions = {}): Promise<number> {
  const argv = options.argv ?? process.argv.slice(1);
  const env = options.env ?? process.env;
  const stdout = options.stdout ?? ((text: string) => process.stdout.write(text));
  const logger = options.logger ?? StructuredLogger.fromEnv(env);

  let exitCode = 0;
  try {
    const plugin = new Plugin({ argv, env, logger });
    const text = formatRunResult(plugin.run(argv[1]));
    if (text.length > 0) {
      stdout(text);
    }
  } catch (error) {
    exitCode = 1;
    logger.error("plugin_failed", describeError(error));
  }
  await logger.flush();
  return exitCode;
}

function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof PluginError) {
    return {
      code: error.code,
      message: error.message,
      ...(error.hint !== undefined ? { hint: error.hint } : {}),
      details: error.details,
    };
  }
  if (error instanceof Error) {
    return { message: error.message };
  }
  return { message: String(error) };
}

/**
 * True when the module identified by {@link moduleUrl} is the script Node was
 * asked to execute. Symlinked plugin executables resolve to the same file.
 */
export function isEntryPoint(moduleUrl: string, executable: string | undefined = process.argv[1]): boolean {
  if (!executable) {
    return false;
  }
  try {
    return realpathSync(fileURLToPath(moduleUrl)) === realpathSync(executable);
  } catch {
    return false;
  }
}
