#!/usr/bin/env npx tsx
/**
 * Standalone runner for the `topology` CLI commands.
 * Usage: npx tsx scripts/run-topology.ts analyze --input ./aws-data --output report.md --mermaid diagram.mmd
 */
import { Command } from "commander";
import { registerTopologyCli } from "../extensions/network-topology/src/cli/cli.js";
import { createTopologyLogger } from "../extensions/network-topology/src/logging/index.js";

const program = new Command("tgw-atlas");
const ctx = {
  program,
  config: {},
  logger: createTopologyLogger("cli"),
};
registerTopologyCli(ctx);
await program.parseAsync(["node", "tgw-atlas", "topology", ...process.argv.slice(2)]);
