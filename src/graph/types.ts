import { z } from "zod";

/** Statistic types understood by the daemon. */
export const STAT_TYPES = ["COUNTER", "ABSOLUTE", "DERIVE", "GAUGE"] as const;
export type StatType = (typeof STAT_TYPES)[number];

/** Draw styles understood by the daemon. */
export const DRAW_STYLES = [
  "AREA",
  "LINE1",
  "LINE2",
  "LINE3",
  "STACK",
  "LINESTACK1",
  "LINESTACK2",
  "LINESTACK3",
  "AREASTACK",
] as const;
export type DrawStyle = (typeof DRAW_STYLES)[number];

export const PERIOD_UNITS = ["second", "minute", "hour"] as const;
export type PeriodUnit = (typeof PERIOD_UNITS)[number];

/** Root and subgraph names: word characters and hyphens. */
export const GRAPH_NAME_PATTERN = /^[\w-]+$/;

/** Field names start with a letter or underscore, then letters, digits and underscores. */
export const FIELD_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

export const GraphNameSchema = z
  .string()
  .regex(GRAPH_NAME_PATTERN, "graph names may only contain letters, digits, underscores and hyphens");

export const FieldNameSchema = z
  .string()
  .regex(FIELD_NAME_PATTERN, "field names must start with a letter or underscore and contain only letters, digits and underscores");

/** Every rendered value occupies exactly one protocol line. */
export const SingleLineSchema = z.string().regex(/^[^\r\n]*$/, "must not contain line breaks");

/** Bounds and thresholds accept either a number or a pre-formatted literal (e.g. `"10:"`). */
const numericLiteral = z.union([z.number(), SingleLineSchema.trim().min(1)]);
const text = SingleLineSchema.min(1);

/**
 * Display attributes of a graph. Every member is optional except `title`;
 * unset members emit no configuration line.
 */
export const GraphAttributesSchema = z
  .object({
    title: text,
    category: text.optional(),
    vlabel: text.optional(),
    info: text.optional(),
    args: text.optional(),
    period: z.enum(PERIOD_UNITS).optional(),
    scale: z.boolean().optional(),
    total: text.optional(),
    order: text.optional(),
    printf: text.optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
  })
  .strict();

export type GraphAttributes = z.infer<typeof GraphAttributesSchema>;

/** Rendering metadata of a single field. */
export const FieldAttributesSchema = z
  .object({
    label: text,
    type: z.enum(STAT_TYPES).optional(),
    draw: z.enum(DRAW_STYLES).optional(),
    info: text.optional(),
    extinfo: text.optional(),
    colour: z.string().regex(/^[0-9A-Fa-f]{6}$/, "colour must be six hexadecimal digits").optional(),
    negative: text.optional(),
    graph: z.boolean().optional(),
    min: numericLiteral.optional(),
    max: numericLiteral.optional(),
    cdef: text.optional(),
    line: numericLiteral.optional(),
    warning: numericLiteral.optional(),
    critical: numericLiteral.optional(),
  })
  .strict();

export type FieldAttributes = z.infer<typeof FieldAttributesSchema>;

/** Field attributes accepted by `Graph.addField`, the label being passed separately. */
export type FieldOptions = Omit<FieldAttributes, "label">;

/**
 * Order in which graph attributes are rendered as `graph_<name>` lines. The
 * constant is exported so tests and callers can rely on it.
 */
export const GRAPH_ATTRIBUTE_ORDER = [
  "title",
  "category",
  "vlabel",
  "info",
  "args",
  "period",
  "scale",
  "total",
  "order",
  "printf",
  "width",
  "height",
] as const satisfies ReadonlyArray<keyof GraphAttributes>;

/** Order in which field attributes are rendered as `<field>.<name>` lines. */
export const FIELD_ATTRIBUTE_ORDER = [
  "label",
  "type",
  "draw",
  "info",
  "extinfo",
  "colour",
  "negative",
  "graph",
  "min",
  "max",
  "cdef",
  "line",
  "warning",
  "critical",
] as const satisfies ReadonlyArray<keyof FieldAttributes>;

/**
 * Current value of a field. `number` is a floating-point measurement,
 * `bigint` an exact integer and `string` a value the plugin already
 * formatted.
 */
export type FieldValue = number | bigint | string;
