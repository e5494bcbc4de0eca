import { tmpdir } from "node:os";
import path from "node:path";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { readList, readOptionalEnum, readString } from "../config/env.js";
import {
  DuplicateGraphError,
  InvalidAttributeError,
  MultipleGraphsNotAllowedError,
  UnknownCommandError,
  UnknownFilterError,
  UnknownGraphError,
  UnknownParentGraphError,
} from "../errors.js";
import type { Graph } from "../graph/graph.js";
import { GRAPH_NAME_PATTERN, GraphNameSchema, type FieldValue } from "../graph/types.js";
import { StructuredLogger } from "../logger.js";
import { readStateFile, writeStateFile, type StateSchema } from "../state/stateFile.js";
import type { PluginEnv } from "../types.js";
import { AttributeFilter } from "./attributeFilter.js";

/** Subcommands understood by every plugin. */
export const SUBCOMMANDS = ["fetch", "config", "autoconf", "suggest"] as const;
export type Subcommand = (typeof SUBCOMMANDS)[number];

/** Name of the built-in filter gating root graphs. */
export const GRAPHS_FILTER = "graphs";

/** Default pattern applied to the entries of custom filters. */
const DEFAULT_FILTER_PATTERN = /^\w+$/;

/** Values of `nested_graphs` disabling nested graph rendering. */
const NESTED_GRAPHS_OFF = ["no", "off"] as const;

/** Fixed identity of a concrete plugin type. */
export interface PluginDescriptor {
  /**
   * Name of the plugin executable. A trailing underscore marks a wildcard
   * plugin whose executable name carries an argument (`if_eth0`).
   */
  readonly name: string;
  /** Multigraph plugins may own several root graphs and nested subgraphs. */
  readonly multigraph: boolean;
}

/** Process inputs handed to a plugin at construction time. */
export interface PluginContext {
  readonly argv?: readonly string[];
  readonly env?: PluginEnv;
  readonly logger?: StructuredLogger;
}

/** Outcome of {@link Plugin.run}, discriminated by the executed subcommand. */
export type RunResult =
  | { readonly command: "fetch" | "config"; readonly output: string }
  | { readonly command: "autoconf"; readonly supported: boolean }
  | { readonly command: "suggest"; readonly suggestions: string[] };

/** Constructor shape expected by the entry point. */
export type PluginClass = new (context: PluginContext) => Plugin;

/**
 * Base class of every plugin. Concrete plugins register their graphs,
 * subgraphs and filters in their constructor, then override
 * {@link retrieveVals} (and optionally {@link autoconf} / {@link suggest}).
 *
 * A plugin instance serves exactly one subcommand and is discarded afterwards.
 */
export class Plugin {
  readonly name: string;
  readonly isMultigraph: boolean;
  /** Argument embedded in the executable name of wildcard plugins, if any. */
  readonly arg0: string | null;
  /** False when `nested_graphs` is set to `no` or `off`. */
  readonly nestedGraphs: boolean;
  readonly stateFile: string;

  protected readonly argv: readonly string[];
  protected readonly env: PluginEnv;
  protected readonly logger: StructuredLogger;

  private readonly rootNames: string[] = [];
  private readonly graphs = new Map<string, Graph>();
  private readonly subgraphs = new Map<string, Map<string, Graph>>();
  private readonly filters = new Map<string, AttributeFilter>();

  constructor(descriptor: PluginDescriptor, context: PluginContext = {}) {
    this.name = descriptor.name;
    this.isMultigraph = descriptor.multigraph;
    this.argv = [...(context.argv ?? [])];
    this.env = { ...(context.env ?? {}) };
    this.logger = context.logger ?? StructuredLogger.fromEnv(this.env);

    this.arg0 = parseWildcardArgument(this.name, this.argv[0]);
    this.stateFile = readString(this.env, "MUNIN_STATEFILE", path.join(tmpdir(), `munin-state-${this.name}`));
    this.nestedGraphs = readOptionalEnum(this.env, "nested_graphs", NESTED_GRAPHS_OFF) === undefined;

    this.registerFilter(GRAPHS_FILTER, GRAPH_NAME_PATTERN);
  }

  /**
   * Registers a filter driven by the `include_<name>` and `exclude_<name>`
   * environment variables (comma-separated lists). Entries failing
   * {@link validationPattern} are ignored.
   */
  registerFilter(filterName: string, validationPattern: string | RegExp = DEFAULT_FILTER_PATTERN): void {
    const include = readList(this.env, `include_${filterName}`);
    const exclude = readList(this.env, `exclude_${filterName}`);
    this.filters.set(filterName, new AttributeFilter(include, exclude, validationPattern));
    this.logger.debug("plugin_filter_registered", { plugin: this.name, filter: filterName, include, exclude });
  }

  /** @throws {UnknownFilterError} when the filter was never registered. */
  checkFilter(filterName: string, attributeName: string): boolean {
    const filter = this.filters.get(filterName);
    if (!filter) {
      throw new UnknownFilterError(filterName);
    }
    return filter.isEnabled(attributeName);
  }

  isGraphEnabled(name: string): boolean {
    return this.checkFilter(GRAPHS_FILTER, name);
  }

  /**
   * Associates a root graph with the plugin.
   *
   * @throws {MultipleGraphsNotAllowedError} when a simple plugin already owns a graph.
   * @throws {InvalidAttributeError} when the name is not a valid graph name.
   * @throws {DuplicateGraphError} when the name is already taken.
   */
  addGraph(name: string, graph: Graph): void {
    if (!this.isMultigraph && this.graphs.size > 0) {
      throw new MultipleGraphsNotAllowedError(name);
    }
    assertGraphName(name);
    if (this.graphs.has(name)) {
      throw new DuplicateGraphError(name);
    }
    this.graphs.set(name, graph);
    this.rootNames.push(name);
  }

  /**
   * Nests a subgraph under a registered root graph. The plugin state is left
   * untouched when the call fails.
   *
   * @throws {MultipleGraphsNotAllowedError} for simple plugins.
   * @throws {InvalidAttributeError} when the subgraph name is not a valid graph name.
   * @throws {UnknownParentGraphError} when the parent is not a root graph.
   * @throws {DuplicateGraphError} when the parent already owns the subgraph name.
   */
  addSubgraph(parentName: string, subgraphName: string, graph: Graph): void {
    if (!this.isMultigraph) {
      throw new MultipleGraphsNotAllowedError(`${parentName}.${subgraphName}`);
    }
    assertGraphName(subgraphName);
    if (!this.graphs.has(parentName)) {
      throw new UnknownParentGraphError(parentName, subgraphName);
    }
    const children = this.subgraphs.get(parentName) ?? new Map<string, Graph>();
    if (children.has(subgraphName)) {
      throw new DuplicateGraphError(`${parentName}.${subgraphName}`);
    }
    children.set(subgraphName, graph);
    this.subgraphs.set(parentName, children);
  }

  hasGraph(name: string): boolean {
    return this.graphs.has(name);
  }

  /** Root graph names in registration order. */
  graphNames(): string[] {
    return [...this.rootNames];
  }

  hasSubgraph(parentName: string, subgraphName: string): boolean {
    return this.subgraphs.get(parentName)?.has(subgraphName) ?? false;
  }

  /** Subgraph names of a root graph in registration order. */
  subgraphNames(parentName: string): string[] {
    if (!this.graphs.has(parentName)) {
      throw new UnknownGraphError(parentName);
    }
    return [...(this.subgraphs.get(parentName)?.keys() ?? [])];
  }

  graphHasField(graphName: string, fieldName: string): boolean {
    return this.requireGraph(graphName).hasField(fieldName);
  }

  graphFieldNames(graphName: string): string[] {
    return this.requireGraph(graphName).fieldNames();
  }

  /** Sets a field value on a root graph; meant for {@link retrieveVals}. */
  setGraphValue(graphName: string, fieldName: string, value: FieldValue | null | undefined): void {
    this.requireGraph(graphName).setValue(fieldName, value);
  }

  /** Sets a field value on a subgraph; meant for {@link retrieveVals}. */
  setSubgraphValue(
    parentName: string,
    subgraphName: string,
    fieldName: string,
    value: FieldValue | null | undefined,
  ): void {
    const graph = this.subgraphs.get(parentName)?.get(subgraphName);
    if (!graph) {
      throw new UnknownGraphError(`${parentName}.${subgraphName}`);
    }
    graph.setValue(fieldName, value);
  }

  /**
   * Saves the plugin state so the next invocation can read it back through
   * {@link restoreState}.
   */
  saveState<TState>(state: TState, schema?: StateSchema<TState>): void {
    writeStateFile(this.stateFile, state, schema);
    this.logger.debug("plugin_state_saved", { plugin: this.name, path: this.stateFile });
  }

  /** Returns the state saved by a previous invocation, or `null` when there is none. */
  restoreState<TState>(schema: StateSchema<TState>): TState | null {
    const state = readStateFile(this.stateFile, schema);
    this.logger.debug("plugin_state_restored", { plugin: this.name, path: this.stateFile, found: state !== null });
    return state;
  }

  /** Populates the field values of the current invocation. Override in concrete plugins. */
  retrieveVals(): void {}

  /** Auto-configuration is unsupported unless a concrete plugin overrides this. */
  autoconf(): boolean {
    return false;
  }

  /** Suggestions for wildcard plugins. None by default. */
  suggest(): string[] {
    return [];
  }

  /** Renders the configuration of every enabled graph. */
  config(): string {
    return this.renderBlocks((graph) => graph.renderConfig());
  }

  /** Collects the values once, then renders them for every enabled graph. */
  fetch(): string {
    this.retrieveVals();
    return this.renderBlocks((graph) => graph.renderValues());
  }

  /**
   * Executes one subcommand. A missing or empty command means `fetch`.
   *
   * @throws {UnknownCommandError} for any other literal.
   */
  run(command?: string): RunResult {
    const resolved = command === undefined || command.length === 0 ? "fetch" : command;
    this.logger.debug("plugin_command", { plugin: this.name, command: resolved });
    switch (resolved) {
      case "fetch":
        return { command: "fetch", output: this.fetch() };
      case "config":
        return { command: "config", output: this.config() };
      case "autoconf":
        return { command: "autoconf", supported: this.autoconf() };
      case "suggest":
        return { command: "suggest", suggestions: this.suggest() };
      default:
        throw new UnknownCommandError(resolved);
    }
  }

  private requireGraph(name: string): Graph {
    const graph = this.graphs.get(name);
    if (!graph) {
      throw new UnknownGraphError(name);
    }
    return graph;
  }

  /**
   * Walks enabled root graphs in registration order, then (unless nesting is
   * disabled) every subgraph of every root graph. Each block is terminated by
   * a blank line; multigraph blocks start with a `multigraph` marker.
   */
  private renderBlocks(render: (graph: Graph) => string): string {
    let output = "";
    for (const name of this.rootNames) {
      const graph = this.graphs.get(name);
      if (!graph || !this.isGraphEnabled(name)) {
        continue;
      }
      output += formatBlock(this.isMultigraph ? `multigraph ${name}` : null, render(graph));
    }
    if (!this.nestedGraphs) {
      return output;
    }
    for (const parentName of this.rootNames) {
      for (const [subgraphName, graph] of this.subgraphs.get(parentName) ?? []) {
        output += formatBlock(`multigraph ${parentName}.${subgraphName}`, render(graph));
      }
    }
    return output;
  }
}

function assertGraphName(name: string): void {
  const checked = GraphNameSchema.safeParse(name);
  if (!checked.success) {
    throw InvalidAttributeError.fromZod(`graph name '${name}'`, checked.error, "name");
  }
}

function formatBlock(marker: string | null, body: string): string {
  return `${marker === null ? "" : `${marker}\n`}${body}\n\n`;
}

/**
 * Extracts the argument of a wildcard plugin from the executable name, e.g.
 * `if_` invoked as `/etc/munin/plugins/if_eth0` yields `eth0`.
 */
function parseWildcardArgument(pluginName: string, executable: string | undefined): string | null {
  if (!pluginName.endsWith("_") || !executable) {
    return null;
  }
  const base = path.basename(executable);
  if (!base.startsWith(pluginName)) {
    return null;
  }
  const suffix = base.slice(pluginName.length);
  return /^\S+$/.test(suffix) ? suffix : null;
}
