import type { ZodError } from "zod";

import { ERROR_CODES, type ErrorCode } from "./types.js";

/**
 * Base error raised by the framework. Every subclass carries a stable code,
 * an optional remediation hint and structured details so the entry point can
 * log the failure without parsing the message.
 */
export class PluginError extends Error {
  public readonly code: ErrorCode;
  public readonly hint: string | undefined;
  public readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details: Record<string, unknown> = {}, hint?: string) {
    super(message);
    this.name = "PluginError";
    this.code = code;
    this.hint = hint;
    this.details = details;
  }
}

/** Raised when a graph already owns a field with the requested name. */
export class DuplicateFieldError extends PluginError {
  constructor(readonly field: string) {
    super(ERROR_CODES.FIELD_DUPLICATE, `field '${field}' is already registered`, { field });
    this.name = "DuplicateFieldError";
  }
}

/** Raised when a value targets a field that was never registered. */
export class UnknownFieldError extends PluginError {
  constructor(readonly field: string) {
    super(ERROR_CODES.FIELD_UNKNOWN, `field '${field}' is not registered`, { field }, "call addField() before setting values");
    this.name = "UnknownFieldError";
  }
}

export class UnknownFilterError extends PluginError {
  constructor(readonly filter: string) {
    super(ERROR_CODES.FILTER_UNKNOWN, `filter '${filter}' is not registered`, { filter }, "call registerFilter() in the plugin constructor");
    this.name = "UnknownFilterError";
  }
}

/** Raised when a simple (non multigraph) plugin is asked to own a second graph. */
export class MultipleGraphsNotAllowedError extends PluginError {
  constructor(readonly graph: string) {
    super(ERROR_CODES.GRAPH_MULTIPLE, "simple plugins cannot have more than one graph", { graph }, "declare the plugin as multigraph");
    this.name = "MultipleGraphsNotAllowedError";
  }
}

export class UnknownParentGraphError extends PluginError {
  constructor(readonly parent: string, readonly subgraph: string) {
    super(ERROR_CODES.GRAPH_PARENT_UNKNOWN, `invalid parent graph '${parent}' used for subgraph '${subgraph}'`, { parent, subgraph });
    this.name = "UnknownParentGraphError";
  }
}

/** Raised when a lookup names a graph (or subgraph) the plugin does not own. */
export class UnknownGraphError extends PluginError {
  constructor(readonly graph: string) {
    super(ERROR_CODES.GRAPH_UNKNOWN, `graph '${graph}' is not registered`, { graph });
    this.name = "UnknownGraphError";
  }
}

/** Raised when a graph or subgraph name is registered twice under the same parent. */
export class DuplicateGraphError extends PluginError {
  constructor(readonly graph: string) {
    super(ERROR_CODES.GRAPH_DUPLICATE, `graph '${graph}' is already registered`, { graph });
    this.name = "DuplicateGraphError";
  }
}

export class UnknownCommandError extends PluginError {
  constructor(readonly command: string) {
    super(ERROR_CODES.COMMAND_UNKNOWN, `invalid command argument: ${command}`, { command }, "use one of fetch, config, autoconf, suggest");
    this.name = "UnknownCommandError";
  }
}

/**
 * Raised when graph or field attributes fail validation. The issues carry the
 * attribute path and the validator message.
 */
export class InvalidAttributeError extends PluginError {
  constructor(readonly subject: string, readonly issues: Array<{ path: string; message: string }>) {
    super(
      ERROR_CODES.ATTR_INVALID,
      `invalid attributes for ${subject}: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`,
      { subject, issues },
    );
    this.name = "InvalidAttributeError";
  }

  /** Converts a zod failure, reporting issues without a path under `rootPath`. */
  static fromZod(subject: string, error: ZodError, rootPath = "(root)"): InvalidAttributeError {
    return new InvalidAttributeError(
      subject,
      error.issues.map((issue) => ({
        path: issue.path.length > 0 ? issue.path.join(".") : rootPath,
        message: issue.message,
      })),
    );
  }
}

/** Raised when the plugin state file cannot be read or written. */
export class StatePersistenceError extends PluginError {
  constructor(readonly path: string, operation: "read" | "write", cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ERROR_CODES.STATE_PERSISTENCE, `failure in ${operation === "read" ? "reading plugin state from" : "storing plugin state in"} file: ${path} (${reason})`, {
      path,
      operation,
      reason,
    });
    this.name = "StatePersistenceError";
  }
}
