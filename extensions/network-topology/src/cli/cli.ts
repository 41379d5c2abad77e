/**
 * Network Topology — CLI Commands
 *
 * Registers `topology` subcommands:
 *   analyze   load an export directory, print the summary, write reports
 *   export    capture an export directory from the AWS APIs
 *   diagram   render the Mermaid diagram of an export directory
 */

import { readFile, writeFile } from "node:fs/promises";
import type { Command } from "commander";
import { findingsAtLeast } from "../analysis/analyzer.js";
import { resolveConfig, type TopologyConfig } from "../config.js";
import { TopologyConfigError, TopologyInputError } from "../errors.js";
import { exportSnapshot } from "../exporter/snapshot.js";
import { loadExportDirectory } from "../loader/export-dir.js";
import type { TopologyLogger } from "../logging/index.js";
import { buildTopology } from "../pipeline.js";
import { toJsonSnapshot } from "../reporting/json.js";
import { formatMarkdownReport } from "../reporting/markdown.js";
import { generateMermaid } from "../reporting/mermaid.js";
import { formatConsoleSummary } from "../reporting/summary.js";
import type { FindingSeverity } from "../types.js";

// =============================================================================
// Types
// =============================================================================

export type CliContext = {
  program: Command;
  /** Raw configuration; validated and merged with `--config` per command. */
  config: unknown;
  logger: TopologyLogger;
};

type AnalyzeOptions = {
  input: string;
  output?: string;
  format: string;
  title?: string;
  mermaid?: string;
  config?: string;
  failOn?: string;
};

type ExportOptions = {
  output: string;
  region?: string;
  profile?: string;
  config?: string;
};

type DiagramOptions = {
  input: string;
  output?: string;
  maxRoutes?: string;
  config?: string;
};

const REPORT_FORMATS = ["md", "json"] as const;
type ReportFormat = (typeof REPORT_FORMATS)[number];

const SEVERITIES: readonly FindingSeverity[] = ["info", "warning", "error"];

// =============================================================================
// Helpers
// =============================================================================

/** Simple table formatter for terminal output. */
function table(headers: string[], rows: string[][]): string {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? "").length)));

  const sep = widths.map((w) => "─".repeat(w + 2)).join("┼");
  const formatRow = (cells: string[]) => cells.map((c, i) => ` ${c.padEnd(widths[i] ?? 0)} `).join("│");

  return [formatRow(headers), sep, ...rows.map(formatRow)].join("\n");
}

function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((f) => f === value);
}

function parseSeverity(value: string): FindingSeverity {
  const severity = SEVERITIES.find((s) => s === value);
  if (!severity) {
    throw new TopologyConfigError(`Invalid --fail-on value "${value}"`, [`expected one of ${SEVERITIES.join(", ")}`]);
  }
  return severity;
}

function parseMaxRoutes(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new TopologyConfigError(`Invalid --max-routes value "${value}"`, ["expected a non-negative integer"]);
  }
  return n;
}

/** Merge `--config <file>` over the context configuration and validate. */
async function loadConfig(ctx: CliContext, file: string | undefined): Promise<TopologyConfig> {
  const base = ctx.config ?? {};
  if (!file) return resolveConfig(base);

  let fileConfig: unknown;
  try {
    fileConfig = JSON.parse(await readFile(file, "utf8"));
  } catch (err) {
    throw new TopologyConfigError(`Could not read config file ${file}`, [
      err instanceof Error ? err.message : String(err),
    ]);
  }
  if (typeof base !== "object" || typeof fileConfig !== "object" || fileConfig === null) {
    return resolveConfig(fileConfig);
  }
  return resolveConfig({ ...base, ...fileConfig });
}

/** Report edge failures as a message and a non-zero exit code; rethrow anything else. */
async function runAction(ctx: CliContext, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    if (err instanceof TopologyInputError || err instanceof TopologyConfigError) {
      ctx.logger.error(err.message);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
}

// =============================================================================
// CLI Registration
// =============================================================================

/**
 * Register `topology` CLI commands.
 */
export function registerTopologyCli(ctx: CliContext): void {
  const topology = ctx.program.command("topology").description("Transit Gateway network topology commands");

  // ---------------------------------------------------------------------------
  // topology analyze
  // ---------------------------------------------------------------------------
  topology
    .command("analyze")
    .description("Reconstruct the topology of an export directory and report findings")
    .option("-i, --input <dir>", "Export directory", "./aws-data")
    .option("-o, --output <file>", "Write a full report to this file")
    .option("-f, --format <format>", "Report format: md | json", "md")
    .option("-t, --title <title>", "Markdown report title")
    .option("--mermaid <file>", "Also write the Mermaid diagram to this file")
    .option("-c, --config <file>", "JSON configuration file")
    .option("--fail-on <severity>", "Exit non-zero when a finding at or above this severity exists")
    .action((opts: AnalyzeOptions) =>
      runAction(ctx, async () => {
        if (!isReportFormat(opts.format)) {
          throw new TopologyConfigError(`Invalid --format value "${opts.format}"`, [
            `expected one of ${REPORT_FORMATS.join(", ")}`,
          ]);
        }
        const failOn = opts.failOn ? parseSeverity(opts.failOn) : undefined;
        const config = await loadConfig(ctx, opts.config);
        ctx.logger.setLevel(config.logging.level);

        const batches = await loadExportDirectory(opts.input, { logger: ctx.logger, accountId: config.accountId });
        const { catalog, findings } = buildTopology(batches, {
          logger: ctx.logger,
          analyzer: { checks: config.checks },
        });

        console.log(formatConsoleSummary(catalog, findings));

        if (opts.output) {
          const content =
            opts.format === "json"
              ? `${JSON.stringify(toJsonSnapshot(catalog, findings), null, 2)}\n`
              : `${formatMarkdownReport(catalog, findings, { title: opts.title })}\n`;
          await writeFile(opts.output, content, "utf8");
          console.log(`\n✓ Report saved to ${opts.output}`);
        }

        if (opts.mermaid) {
          await writeFile(
            opts.mermaid,
            `${generateMermaid(catalog, { maxRoutesPerTable: config.diagram.maxRoutesPerTable })}\n`,
            "utf8",
          );
          console.log(`✓ Mermaid diagram saved to ${opts.mermaid}`);
        }

        if (failOn && findingsAtLeast(findings, failOn).length > 0) {
          process.exitCode = 1;
        }
      }),
    );

  // ---------------------------------------------------------------------------
  // topology export
  // ---------------------------------------------------------------------------
  topology
    .command("export")
    .description("Capture an export directory from the EC2, Direct Connect and STS APIs (read-only)")
    .option("-o, --output <dir>", "Output directory", "./aws-data")
    .option("-r, --region <region>", "AWS region")
    .option("-p, --profile <profile>", "Named AWS profile")
    .option("-c, --config <file>", "JSON configuration file")
    .action((opts: ExportOptions) =>
      runAction(ctx, async () => {
        const config = await loadConfig(ctx, opts.config);
        ctx.logger.setLevel(config.logging.level);

        const region = opts.region ?? config.export.region;
        const profile = opts.profile ?? config.export.profile;
        console.log(`\nExporting ${region} (profile: ${profile ?? "default"}) to ${opts.output}\n`);

        const results = await exportSnapshot(opts.output, { region, profile, logger: ctx.logger });
        const rows = results.map((r) => [r.file, r.ok ? "✓" : "⚠", String(r.count)]);
        console.log(table(["File", "Status", "Items"], rows));

        const ok = results.filter((r) => r.ok).length;
        console.log(`\n${ok}/${results.length} files exported`);
      }),
    );

  // ---------------------------------------------------------------------------
  // topology diagram
  // ---------------------------------------------------------------------------
  topology
    .command("diagram")
    .description("Render the Mermaid diagram of an export directory")
    .option("-i, --input <dir>", "Export directory", "./aws-data")
    .option("-o, --output <file>", "Write the diagram to this file instead of stdout")
    .option("--max-routes <n>", "Routes listed per route table")
    .option("-c, --config <file>", "JSON configuration file")
    .action((opts: DiagramOptions) =>
      runAction(ctx, async () => {
        const config = await loadConfig(ctx, opts.config);
        ctx.logger.setLevel(config.logging.level);
        const maxRoutesPerTable =
          opts.maxRoutes !== undefined ? parseMaxRoutes(opts.maxRoutes) : config.diagram.maxRoutesPerTable;

        const batches = await loadExportDirectory(opts.input, { logger: ctx.logger, accountId: config.accountId });
        const { catalog } = buildTopology(batches, { logger: ctx.logger, analyzer: { checks: config.checks } });
        const diagram = generateMermaid(catalog, { maxRoutesPerTable });

        if (opts.output) {
          await writeFile(opts.output, `${diagram}\n`, "utf8");
          console.log(`✓ Mermaid diagram saved to ${opts.output}`);
        } else {
          console.log(diagram);
        }
      }),
    );
}
