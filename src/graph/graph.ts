import { DuplicateFieldError, InvalidAttributeError, UnknownFieldError } from "../errors.js";
import { formatAttributeValue, formatFieldValue } from "./render.js";
import {
  FIELD_ATTRIBUTE_ORDER,
  FieldAttributesSchema,
  FieldNameSchema,
  GRAPH_ATTRIBUTE_ORDER,
  GraphAttributesSchema,
  SingleLineSchema,
  type FieldAttributes,
  type FieldOptions,
  type FieldValue,
  type GraphAttributes,
} from "./types.js";

/** Display attributes accepted by the constructor, the title being passed separately. */
export type GraphOptions = Omit<GraphAttributes, "title">;

/**
 * One chart definition: display attributes, an ordered list of fields and the
 * values collected for the current invocation.
 *
 * Field registration order is the canonical rendering order for both the
 * configuration and the value output.
 */
export class Graph {
  private readonly attributes: Readonly<GraphAttributes>;
  private readonly fields = new Map<string, Readonly<FieldAttributes>>();
  private readonly values = new Map<string, FieldValue>();

  constructor(title: string, options: GraphOptions = {}) {
    const parsed = GraphAttributesSchema.safeParse({ ...options, title });
    if (!parsed.success) {
      throw InvalidAttributeError.fromZod(`graph '${title}'`, parsed.error);
    }
    this.attributes = Object.freeze(parsed.data);
  }

  get title(): string {
    return this.attributes.title;
  }

  /** Returns a copy of the display attributes. */
  graphAttributes(): GraphAttributes {
    return { ...this.attributes };
  }

  /**
   * Registers a field. Fields are immutable once added; only their current
   * value changes afterwards.
   *
   * @throws {DuplicateFieldError} when the name is already registered.
   * @throws {InvalidAttributeError} when the name or the attributes fail validation.
   */
  addField(name: string, label: string, options: FieldOptions = {}): this {
    const checkedName = FieldNameSchema.safeParse(name);
    if (!checkedName.success) {
      throw InvalidAttributeError.fromZod(`field '${name}'`, checkedName.error, "name");
    }
    if (this.fields.has(name)) {
      throw new DuplicateFieldError(name);
    }
    const parsed = FieldAttributesSchema.safeParse({ ...options, label });
    if (!parsed.success) {
      throw InvalidAttributeError.fromZod(`field '${name}'`, parsed.error);
    }
    this.fields.set(name, Object.freeze(parsed.data));
    return this;
  }

  hasField(name: string): boolean {
    return this.fields.has(name);
  }

  fieldNames(): string[] {
    return [...this.fields.keys()];
  }

  fieldAttributes(name: string): FieldAttributes {
    const attributes = this.fields.get(name);
    if (!attributes) {
      throw new UnknownFieldError(name);
    }
    return { ...attributes };
  }

  /**
   * Stores the current value of a field. Passing `null` or `undefined` clears
   * it so the field is skipped by {@link renderValues}.
   *
   * @throws {UnknownFieldError} when the field was never registered.
   * @throws {InvalidAttributeError} when a pre-formatted value spans several lines.
   */
  setValue(name: string, value: FieldValue | null | undefined): void {
    if (!this.fields.has(name)) {
      throw new UnknownFieldError(name);
    }
    if (value === null || value === undefined) {
      this.values.delete(name);
      return;
    }
    if (typeof value === "string") {
      const checked = SingleLineSchema.safeParse(value);
      if (!checked.success) {
        throw InvalidAttributeError.fromZod(`field '${name}'`, checked.error, "value");
      }
    }
    this.values.set(name, value);
  }

  getValue(name: string): FieldValue | undefined {
    if (!this.fields.has(name)) {
      throw new UnknownFieldError(name);
    }
    return this.values.get(name);
  }

  clearValues(): void {
    this.values.clear();
  }

  /**
   * Renders the configuration lines: `graph_<attr> <value>` for every set
   * display attribute, then `<field>.<attr> <value>` for every set field
   * attribute, both following the fixed attribute orders.
   */
  renderConfig(): string {
    const lines: string[] = [];
    for (const key of GRAPH_ATTRIBUTE_ORDER) {
      const value = this.attributes[key];
      if (value !== undefined) {
        lines.push(`graph_${key} ${formatAttributeValue(value)}`);
      }
    }
    for (const [fieldName, attributes] of this.fields) {
      for (const key of FIELD_ATTRIBUTE_ORDER) {
        const value = attributes[key];
        if (value !== undefined) {
          lines.push(`${fieldName}.${key} ${formatAttributeValue(value)}`);
        }
      }
    }
    return lines.join("\n");
  }

  /** Renders one `<field>.value <value>` line per field holding a value. */
  renderValues(): string {
    const lines: string[] = [];
    for (const fieldName of this.fields.keys()) {
      const value = this.values.get(fieldName);
      if (value !== undefined) {
        lines.push(`${fieldName}.value ${formatFieldValue(value)}`);
      }
    }
    return lines.join("\n");
  }
}
