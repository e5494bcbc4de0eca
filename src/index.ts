export { AttributeFilter } from "./plugin/attributeFilter.js";
export {
  GRAPHS_FILTER,
  Plugin,
  SUBCOMMANDS,
  type PluginClass,
  type PluginContext,
  type PluginDescriptor,
  type RunResult,
  type Subcommand,
} from "./plugin/plugin.js";
export { Graph, type GraphOptions } from "./graph/graph.js";
export {
  DRAW_STYLES,
  FIELD_ATTRIBUTE_ORDER,
  FIELD_NAME_PATTERN,
  GRAPH_ATTRIBUTE_ORDER,
  GRAPH_NAME_PATTERN,
  PERIOD_UNITS,
  STAT_TYPES,
  type DrawStyle,
  type FieldAttributes,
  type FieldOptions,
  type FieldValue,
  type GraphAttributes,
  type PeriodUnit,
  type StatType,
} from "./graph/types.js";
export { formatAttributeValue, formatFieldValue, UNKNOWN_VALUE } from "./graph/render.js";
export { formatRunResult, isEntryPoint, pluginMain, type PluginMainOptions } from "./cli.js";
export { readStateFile, writeStateFile, STATE_FILE_VERSION, type StateSchema } from "./state/stateFile.js";
export { StructuredLogger, type LogEntry, type LogLevel, type LoggerOptions } from "./logger.js";
export * from "./errors.js";
export { ERROR_CATALOG, ERROR_CODES, type ErrorCode, type PluginEnv } from "./types.js";
