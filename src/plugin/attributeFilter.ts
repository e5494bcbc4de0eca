/**
 * Include/exclude gate deciding whether a named attribute (a graph, a disk,
 * an interface, ...) is enabled.
 *
 * - With an empty include list every attribute is enabled by default.
 * - With a non-empty include list only the listed attributes are enabled.
 * - Any attribute in the exclude list is disabled, even when also included.
 *
 * When a validation pattern is given, list entries that do not match it from
 * the start of the string are ignored.
 */
export class AttributeFilter {
  private readonly overrides = new Map<string, boolean>();
  private readonly defaultEnabled: boolean;
  private readonly pattern: RegExp | null;

  constructor(include: readonly string[] = [], exclude: readonly string[] = [], validationPattern?: string | RegExp) {
    this.pattern = validationPattern === undefined ? null : anchorAtStart(validationPattern);
    this.defaultEnabled = include.length === 0;
    for (const name of include) {
      if (this.isValid(name)) {
        this.overrides.set(name, true);
      }
    }
    for (const name of exclude) {
      if (this.isValid(name)) {
        this.overrides.set(name, false);
      }
    }
  }

  isEnabled(name: string): boolean {
    return this.overrides.get(name) ?? this.defaultEnabled;
  }

  private isValid(name: string): boolean {
    if (!this.pattern) {
      return true;
    }
    this.pattern.lastIndex = 0;
    return this.pattern.test(name);
  }
}

/** Sticky copy of the pattern so `test` only matches at index 0. */
function anchorAtStart(pattern: string | RegExp): RegExp {
  if (typeof pattern === "string") {
    return new RegExp(pattern, "y");
  }
  const flags = pattern.flags.replace("g", "");
  return new RegExp(pattern.source, flags.includes("y") ? flags : `${flags}y`);
}
