#!/usr/bin/env node
import process from "node:process";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.
import { z } from "zod";

import { isEntryPoint, pluginMain } from "../cli.js";
import { Graph } from "../graph/graph.js";
import { Plugin, type PluginContext } from "../plugin/plugin.js";

/** Sources of the figures reported by {@link ProcessPlugin}. */
export interface ProcessSampler {
  memoryUsage(): { rss: number; heapTotal: number; heapUsed: number; external: number };
  cpuUsage(): { user: number; system: number };
  uptime(): number;
  /** Epoch milliseconds. */
  now(): number;
}

const defaultSampler: ProcessSampler = {
  memoryUsage: () => process.memoryUsage(),
  cpuUsage: () => process.cpuUsage(),
  uptime: () => process.uptime(),
  now: () => Date.now(),
};

const ProcessStateSchema = z.object({ sampledAt: z.number().int().nonnegative() }).strict();
type ProcessState = z.infer<typeof ProcessStateSchema>;

/** Memory fields, in render order. The `memory` filter selects among them. */
const MEMORY_FIELDS = [
  { name: "rss", label: "resident set", key: "rss" },
  { name: "heap_total", label: "heap allocated", key: "heapTotal" },
  { name: "heap_used", label: "heap used", key: "heapUsed" },
  { name: "external", label: "external", key: "external" },
] as const;

/**
 * Sample multigraph plugin reporting memory, CPU time and uptime of the
 * running Node.js process.
 *
 * Graphs: `node_memory` (with the nested `node_memory.heap` subgraph),
 * `node_cpu` and `node_uptime`. Memory fields can be narrowed through
 * `include_memory` / `exclude_memory`; the time elapsed since the previous
 * fetch is kept in the state file.
 */
export class ProcessPlugin extends Plugin {
  static readonly pluginName = "node_process";

  private readonly sampler: ProcessSampler;

  constructor(context: PluginContext = {}, sampler: ProcessSampler = defaultSampler) {
    super({ name: ProcessPlugin.pluginName, multigraph: true }, context);
    this.sampler = sampler;
    this.registerFilter("memory");

    const memory = new Graph("Node.js process memory", {
      category: "processes",
      vlabel: "bytes",
      args: "--base 1024 --lower-limit 0",
      info: "Memory held by the plugin process.",
    });
    for (const field of MEMORY_FIELDS) {
      if (this.checkFilter("memory", field.name)) {
        memory.addField(field.name, field.label, { type: "GAUGE", draw: "LINE2", min: 0 });
      }
    }
    this.addGraph("node_memory", memory);

    const heap = new Graph("Node.js heap", { category: "processes", vlabel: "bytes", args: "--base 1024" });
    heap.addField("used", "used", { type: "GAUGE", draw: "AREA", min: 0 });
    heap.addField("free", "free", { type: "GAUGE", draw: "STACK", min: 0 });
    this.addSubgraph("node_memory", "heap", heap);

    const cpu = new Graph("Node.js process CPU time", {
      category: "processes",
      vlabel: "microseconds per ${graph_period}",
      period: "second",
      scale: false,
    });
    cpu.addField("user", "user", { type: "DERIVE", draw: "AREA", min: 0 });
    cpu.addField("system", "system", { type: "DERIVE", draw: "STACK", min: 0 });
    this.addGraph("node_cpu", cpu);

    const uptime = new Graph("Node.js process uptime", { category: "processes", vlabel: "seconds", scale: false });
    uptime.addField("uptime", "uptime", { type: "GAUGE", draw: "LINE2", min: 0 });
    uptime.addField("interval", "since last fetch", {
      type: "GAUGE",
      draw: "LINE1",
      min: 0,
      info: "Seconds elapsed since the previous fetch.",
    });
    this.addGraph("node_uptime", uptime);
  }

  override retrieveVals(): void {
    const memory = this.sampler.memoryUsage();
    for (const field of MEMORY_FIELDS) {
      if (this.graphHasField("node_memory", field.name)) {
        this.setGraphValue("node_memory", field.name, BigInt(memory[field.key]));
      }
    }
    this.setSubgraphValue("node_memory", "heap", "used", BigInt(memory.heapUsed));
    this.setSubgraphValue("node_memory", "heap", "free", BigInt(memory.heapTotal - memory.heapUsed));

    const cpu = this.sampler.cpuUsage();
    this.setGraphValue("node_cpu", "user", BigInt(cpu.user));
    this.setGraphValue("node_cpu", "system", BigInt(cpu.system));

    const now = this.sampler.now();
    const previous = this.restoreState<ProcessState>(ProcessStateSchema);
    this.setGraphValue("node_uptime", "uptime", this.sampler.uptime());
    if (previous !== null && previous.sampledAt <= now) {
      this.setGraphValue("node_uptime", "interval", (now - previous.sampledAt) / 1000);
    }
    this.saveState<ProcessState>({ sampledAt: now }, ProcessStateSchema);
  }

  override autoconf(): boolean {
    return true;
  }
}

if (isEntryPoint(import.meta.url)) {
  pluginMain(ProcessPlugin)
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = 1;
    });
}
