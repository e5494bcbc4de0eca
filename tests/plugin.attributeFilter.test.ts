import { describe, it } from "mocha";
import { expect } from "chai";

import { AttributeFilter } from "../src/plugin/attributeFilter.js";

describe("plugin/attributeFilter", () => {
  it("enables every attribute when both lists are empty", () => {
    const filter = new AttributeFilter();
    expect(filter.isEnabled("load")).to.equal(true);
    expect(filter.isEnabled("")).to.equal(true);
    expect(filter.isEnabled("anything at all")).to.equal(true);
  });

  it("only enables included attributes once the include list is non-empty", () => {
    const filter = new AttributeFilter(["sda", "sdb"], []);
    expect(filter.isEnabled("sda")).to.equal(true);
    expect(filter.isEnabled("sdb")).to.equal(true);
    expect(filter.isEnabled("sdc")).to.equal(false);
  });

  it("disables excluded attributes while keeping the default for the rest", () => {
    const filter = new AttributeFilter([], ["lo"]);
    expect(filter.isEnabled("lo")).to.equal(false);
    expect(filter.isEnabled("eth0")).to.equal(true);
  });

  it("lets the exclude list win over the include list", () => {
    const filter = new AttributeFilter(["eth0", "eth1"], ["eth1"]);
    expect(filter.isEnabled("eth0")).to.equal(true);
    expect(filter.isEnabled("eth1")).to.equal(false);
  });

  it("ignores entries that fail the validation pattern", () => {
    const filter = new AttributeFilter([], ["bad-name", "lo"], /^\w+$/);
    expect(filter.isEnabled("bad-name"), "invalid exclude entries fall back to the default").to.equal(true);
    expect(filter.isEnabled("lo")).to.equal(false);
  });

  it("keeps the default disabled when every include entry is invalid", () => {
    const filter = new AttributeFilter(["not valid"], [], /^\w+$/);
    expect(filter.isEnabled("not valid")).to.equal(false);
    expect(filter.isEnabled("other")).to.equal(false);
  });

  it("matches string patterns from the start of the name only", () => {
    const filter = new AttributeFilter(["1a", "a1"], [], "\\d+");
    expect(filter.isEnabled("1a"), "prefix match is enough").to.equal(true);
    expect(filter.isEnabled("a1"), "a match further in the name does not count").to.equal(false);
  });

  it("accepts global regular expressions without carrying state between checks", () => {
    const filter = new AttributeFilter(["web-1", "web-2"], [], /[\w-]+$/g);
    expect(filter.isEnabled("web-1")).to.equal(true);
    expect(filter.isEnabled("web-2")).to.equal(true);
  });
});
