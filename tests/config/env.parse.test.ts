/**
 * Table-driven tests covering the environment readers used by plugins. The
 * readers take the environment record explicitly so no global state needs to
 * be restored between cases.
 */
import { describe, it } from "mocha";
import { expect } from "chai";

import { readBool, readList, readOptionalBool, readOptionalEnum, readOptionalString, readString } from "../../src/config/env.js";

describe("config/env helpers", () => {
  it("interprets boolean flags case-insensitively", () => {
    expect(readBool({ MUNIN_DEBUG: "YES" }, "MUNIN_DEBUG", false)).to.equal(true);
    expect(readOptionalBool({ MUNIN_DEBUG: "off" }, "MUNIN_DEBUG")).to.equal(false);
    expect(readOptionalBool({ MUNIN_DEBUG: "  " }, "MUNIN_DEBUG")).to.equal(undefined);
  });

  it("falls back to defaults when booleans are ambiguous", () => {
    expect(readBool({ MUNIN_DEBUG: "maybe" }, "MUNIN_DEBUG", true)).to.equal(true);
    expect(readOptionalBool({}, "MUNIN_DEBUG")).to.equal(undefined);
  });

  it("trims strings and treats blank values as unset", () => {
    expect(readOptionalString({ MUNIN_STATEFILE: " /tmp/state " }, "MUNIN_STATEFILE")).to.equal("/tmp/state");
    expect(readOptionalString({ MUNIN_STATEFILE: "" }, "MUNIN_STATEFILE")).to.equal(undefined);
    expect(readString({ MUNIN_STATEFILE: "   " }, "MUNIN_STATEFILE", "/default")).to.equal("/default");
  });

  it("splits comma-separated lists and drops empty entries", () => {
    expect(readList({ include_disk: "sda, sdb,,sdc ," }, "include_disk")).to.deep.equal(["sda", "sdb", "sdc"]);
    expect(readList({}, "include_disk")).to.deep.equal([]);
  });

  it("returns a fresh list on every call", () => {
    const first = readList({}, "exclude_disk");
    first.push("sda");
    expect(readList({}, "exclude_disk")).to.deep.equal([]);
  });

  it("resolves enum literals to their canonical spelling", () => {
    expect(readOptionalEnum({ nested_graphs: "OFF" }, "nested_graphs", ["no", "off"])).to.equal("off");
    expect(readOptionalEnum({ nested_graphs: "yes" }, "nested_graphs", ["no", "off"])).to.equal(undefined);
  });
});
