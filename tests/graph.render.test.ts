import { describe, it } from "mocha";
import { expect } from "chai";

import { DuplicateFieldError, InvalidAttributeError, UnknownFieldError } from "../src/errors.js";
import { Graph } from "../src/graph/graph.js";
import type { FieldOptions } from "../src/graph/types.js";

describe("graph/render", () => {
  describe("renderConfig", () => {
    it("renders the title before the category and nothing else without fields", () => {
      const graph = new Graph("T", { category: "C" });
      expect(graph.renderConfig()).to.equal("graph_title T\ngraph_category C");
    });

    it("follows the fixed graph attribute order regardless of declaration order", () => {
      const graph = new Graph("Load average", {
        height: 200,
        scale: false,
        vlabel: "load",
        period: "minute",
        printf: "%6.2lf",
        width: 400,
        order: "load5 load1",
        total: "sum",
        args: "--base 1000",
        info: "System load.",
        category: "system",
      });

      expect(graph.renderConfig().split("\n")).to.deep.equal([
        "graph_title Load average",
        "graph_category system",
        "graph_vlabel load",
        "graph_info System load.",
        "graph_args --base 1000",
        "graph_period minute",
        "graph_scale no",
        "graph_total sum",
        "graph_order load5 load1",
        "graph_printf %6.2lf",
        "graph_width 400",
        "graph_height 200",
      ]);
    });

    it("renders field attributes per field in registration order", () => {
      const graph = new Graph("Traffic")
        .addField("down", "received", {
          warning: "10:",
          min: 0,
          graph: false,
          colour: "ff0000",
          draw: "LINE2",
          type: "DERIVE",
        })
        .addField("up", "sent", { negative: "down", cdef: "up,8,*", max: 1000, critical: 2000, line: 500 });

      expect(graph.renderConfig().split("\n")).to.deep.equal([
        "graph_title Traffic",
        "down.label received",
        "down.type DERIVE",
        "down.draw LINE2",
        "down.colour ff0000",
        "down.graph no",
        "down.min 0",
        "down.warning 10:",
        "up.label sent",
        "up.negative down",
        "up.max 1000",
        "up.cdef up,8,*",
        "up.line 500",
        "up.critical 2000",
      ]);
    });

    it("exposes a copy of its display attributes", () => {
      const graph = new Graph("Memory", { vlabel: "bytes" });
      const attributes = graph.graphAttributes();
      attributes.vlabel = "changed";

      expect(graph.title).to.equal("Memory");
      expect(graph.graphAttributes()).to.deep.equal({ title: "Memory", vlabel: "bytes" });
    });

    it("renders true flags as yes", () => {
      const graph = new Graph("Flags", { scale: true }).addField("a", "A", { graph: true });
      expect(graph.renderConfig()).to.equal("graph_title Flags\ngraph_scale yes\na.label A\na.graph yes");
    });
  });

  describe("fields", () => {
    it("rejects duplicate field names and keeps the first definition", () => {
      const graph = new Graph("Disk").addField("sda", "first disk");

      expect(() => graph.addField("sda", "again")).to.throw(DuplicateFieldError).with.property("code", "E-FIELD-DUPLICATE");
      expect(graph.fieldNames()).to.deep.equal(["sda"]);
      expect(graph.fieldAttributes("sda").label).to.equal("first disk");
    });

    it("rejects field names the protocol cannot carry", () => {
      const graph = new Graph("Names");

      expect(() => graph.addField("a b.c", "A")).to.throw(InvalidAttributeError, /name: field names must start/);
      expect(() => graph.addField("1st", "A")).to.throw(InvalidAttributeError);
      expect(() => graph.addField("eth-0", "A")).to.throw(InvalidAttributeError);
      expect(graph.fieldNames()).to.deep.equal([]);
      expect(graph.renderConfig()).to.equal("graph_title Names");
    });

    it("lists fields in registration order", () => {
      const graph = new Graph("Disk").addField("sdb", "b").addField("sda", "a");
      expect(graph.fieldNames()).to.deep.equal(["sdb", "sda"]);
      expect(graph.hasField("sda")).to.equal(true);
      expect(graph.hasField("sdc")).to.equal(false);
    });

    it("validates attribute values", () => {
      expect(() => new Graph("Sized", { width: 0 })).to.throw(InvalidAttributeError);
      expect(() => new Graph("")).to.throw(InvalidAttributeError);
      expect(() => new Graph("Colour").addField("a", "A", { colour: "red" }))
        .to.throw(InvalidAttributeError)
        .with.property("code", "E-ATTR-INVALID");

      const untyped: FieldOptions = JSON.parse('{"draw":"LINE4"}');
      const graph = new Graph("Draw");
      expect(() => graph.addField("a", "A", untyped)).to.throw(InvalidAttributeError, /draw/);
      expect(graph.fieldNames(), "a rejected field is not registered").to.deep.equal([]);
    });

    it("rejects line breaks in titles, labels and literal attributes", () => {
      expect(() => new Graph("V\nmultigraph evil")).to.throw(InvalidAttributeError, /title: must not contain line breaks/);

      const graph = new Graph("V");
      expect(() => graph.addField("a", "A\nb.value 9")).to.throw(InvalidAttributeError, /label/);
      expect(() => graph.addField("a", "A", { warning: "10:\r20" })).to.throw(InvalidAttributeError);
      expect(graph.renderConfig()).to.equal("graph_title V");
    });
  });

  describe("renderValues", () => {
    it("formats floating-point values with six decimals and skips unset fields", () => {
      const graph = new Graph("Values").addField("a", "A").addField("b", "B");
      graph.setValue("a", 3.0);
      expect(graph.renderValues()).to.equal("a.value 3.000000");
    });

    it("renders integers, pre-formatted strings and unknown values", () => {
      const graph = new Graph("Values")
        .addField("count", "count")
        .addField("ratio", "ratio")
        .addField("raw", "raw")
        .addField("broken", "broken");
      graph.setValue("raw", "1.5");
      graph.setValue("count", 42n);
      graph.setValue("ratio", 0.1234567);
      graph.setValue("broken", Number.NaN);

      expect(graph.renderValues().split("\n")).to.deep.equal([
        "count.value 42",
        "ratio.value 0.123457",
        "raw.value 1.5",
        "broken.value U",
      ]);
    });

    it("prints large magnitudes without exponent notation", () => {
      const graph = new Graph("Values").addField("a", "A").addField("b", "B");
      graph.setValue("a", 1e21);
      graph.setValue("b", -4e21);

      expect(graph.renderValues().split("\n")).to.deep.equal([
        "a.value 1000000000000000000000.000000",
        "b.value -4000000000000000000000.000000",
      ]);
    });

    it("refuses pre-formatted values spanning several lines", () => {
      const graph = new Graph("Values").addField("a", "A");

      expect(() => graph.setValue("a", "1\nevil.value 2"))
        .to.throw(InvalidAttributeError, /value: must not contain line breaks/)
        .with.property("code", "E-ATTR-INVALID");
      expect(graph.getValue("a")).to.equal(undefined);
      expect(graph.renderValues()).to.equal("");
    });

    it("clears a value when set to null", () => {
      const graph = new Graph("Values").addField("a", "A");
      graph.setValue("a", 1);
      graph.setValue("a", null);
      expect(graph.getValue("a")).to.equal(undefined);
      expect(graph.renderValues()).to.equal("");
    });

    it("refuses values for unregistered fields", () => {
      const graph = new Graph("Values").addField("a", "A");
      expect(() => graph.setValue("b", 1)).to.throw(UnknownFieldError).with.property("code", "E-FIELD-UNKNOWN");
      expect(graph.renderValues()).to.equal("");
    });

    it("drops every value on clearValues", () => {
      const graph = new Graph("Values").addField("a", "A").addField("b", "B");
      graph.setValue("a", 1n);
      graph.setValue("b", 2n);
      graph.clearValues();
      expect(graph.renderValues()).to.equal("");
    });
  });
});
