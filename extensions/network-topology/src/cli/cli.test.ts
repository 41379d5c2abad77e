/**
 * Tests for the `topology` CLI commands.
 */

import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, expectTypeOf, it, vi, type MockInstance } from "vitest";
import { Command } from "commander";
import { exportSnapshot } from "../exporter/snapshot.js";
import { createTopologyLogger, MemoryTransport } from "../logging/index.js";
import { registerTopologyCli, type CliContext } from "./cli.js";

vi.mock("../exporter/snapshot.js", () => ({
  exportSnapshot: vi.fn(),
}));

// ── Fixtures ────────────────────────────────────────────────────────────────

const ACCOUNT = "111111111111";

async function writeExport(dir: string): Promise<void> {
  const files: Record<string, unknown> = {
    "metadata.json": { aws_account_id: ACCOUNT, region: "us-east-1" },
    "transit-gateways.json": { TransitGateways: [{ TransitGatewayId: "tgw-1", OwnerId: ACCOUNT }] },
    "transit-gateway-route-tables.json": {
      TransitGatewayRouteTables: [{ TransitGatewayRouteTableId: "tgw-rtb-1", TransitGatewayId: "tgw-1" }],
    },
    "routes-tgw-rtb-1.json": { Routes: [{ DestinationCidrBlock: "192.168.0.0/16", State: "blackhole" }] },
  };
  for (const [file, data] of Object.entries(files)) {
    await writeFile(join(dir, file), JSON.stringify(data), "utf8");
  }
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe("registerTopologyCli", () => {
  let dir: string;
  let program: Command;
  let transport: MemoryTransport;
  let log: MockInstance<typeof console.log>;

  const output = () => log.mock.calls.map((c) => String(c[0])).join("\n");
  const run = (...args: string[]) => program.parseAsync(["topology", ...args], { from: "user" });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "topology-cli-"));
    await writeExport(dir);

    program = new Command();
    program.exitOverride();
    transport = new MemoryTransport();
    const ctx: CliContext = {
      program,
      config: {},
      logger: createTopologyLogger("cli", { transports: [transport] }),
    };
    registerTopologyCli(ctx);
    log = vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    process.exitCode = undefined;
    log.mockRestore();
    vi.mocked(exportSnapshot).mockReset();
    await rm(dir, { recursive: true, force: true });
  });

  it("registers the three subcommands", () => {
    const topology = program.commands.find((c) => c.name() === "topology");
    expect(topology?.commands.map((c) => c.name())).toEqual(["analyze", "export", "diagram"]);
  });

  it("takes only the program, config and logger from the context", () => {
    expectTypeOf<keyof CliContext>().toEqualTypeOf<"program" | "config" | "logger">();
  });

  // ── analyze ───────────────────────────────────────────────────────────────

  describe("topology analyze", () => {
    it("prints the console summary", async () => {
      await run("analyze", "-i", dir);

      expect(output()).toContain(`🏠 Hub Account Mode (TGW owner: ${ACCOUNT})`);
      expect(output()).toContain("   • [blackhole] Blackhole route to 192.168.0.0/16 in tgw-rtb-1");
      expect(process.exitCode).toBeUndefined();
    });

    it("writes a Markdown report and a diagram", async () => {
      const report = join(dir, "report.md");
      const diagram = join(dir, "diagram.mmd");
      await run("analyze", "-i", dir, "-o", report, "--mermaid", diagram);

      expect((await readFile(report, "utf8")).split("\n")[0]).toBe("# Transit Gateway Network Report");
      expect((await readFile(diagram, "utf8")).split("\n")[0]).toBe("flowchart TB");
      expect(output()).toContain(`✓ Report saved to ${report}`);
    });

    it("uses --title as the Markdown heading", async () => {
      const report = join(dir, "report.md");
      await run("analyze", "-i", dir, "-o", report, "--title", "Prod network");

      expect((await readFile(report, "utf8")).split("\n")[0]).toBe("# Prod network");
    });

    it("writes a JSON report", async () => {
      const report = join(dir, "report.json");
      await run("analyze", "-i", dir, "-o", report, "-f", "json");

      const parsed: unknown = JSON.parse(await readFile(report, "utf8"));
      expect(parsed).toMatchObject({ accountId: ACCOUNT, accountMode: "hub", findings: [{ kind: "blackhole" }] });
    });

    it("sets a failing exit code when --fail-on is met", async () => {
      await run("analyze", "-i", dir, "--fail-on", "warning");
      expect(process.exitCode).toBe(1);
    });

    it("keeps a zero exit code below the --fail-on threshold", async () => {
      await run("analyze", "-i", dir, "--fail-on", "error");
      expect(process.exitCode).toBeUndefined();
    });

    it("applies checks from a config file", async () => {
      const config = join(dir, "topology.json");
      await writeFile(config, JSON.stringify({ checks: { blackholes: false } }), "utf8");

      await run("analyze", "-i", dir, "-c", config, "--fail-on", "warning");

      expect(output()).toContain("✓ No issues detected");
      expect(process.exitCode).toBeUndefined();
    });

    it("reports an invalid config file", async () => {
      const config = join(dir, "topology.json");
      await writeFile(config, JSON.stringify({ logging: { level: "loud" } }), "utf8");

      await run("analyze", "-i", dir, "-c", config);

      expect(transport.messages("error")[0]?.startsWith("Invalid topology configuration")).toBe(true);
      expect(process.exitCode).toBe(1);
    });

    it("reports a missing export directory", async () => {
      const missing = join(dir, "absent");
      await run("analyze", "-i", missing);

      expect(transport.messages("error")[0]?.startsWith(`Export directory not found: ${missing}`)).toBe(true);
      expect(process.exitCode).toBe(1);
    });

    it("rejects an unknown format", async () => {
      await run("analyze", "-i", dir, "-f", "html");
      expect(transport.messages("error")).toEqual(['Invalid --format value "html"\n  expected one of md, json']);
      expect(process.exitCode).toBe(1);
    });
  });

  // ── export ────────────────────────────────────────────────────────────────

  describe("topology export", () => {
    it("runs the exporter and prints the file table", async () => {
      vi.mocked(exportSnapshot).mockResolvedValue([
        { file: "vpcs.json", count: 3, ok: true },
        { file: "metadata.json", count: 1, ok: false },
      ]);
      const out = join(dir, "capture");

      await run("export", "-o", out, "-r", "eu-west-1", "-p", "audit");

      expect(exportSnapshot).toHaveBeenCalledWith(out, expect.objectContaining({ region: "eu-west-1", profile: "audit" }));
      expect(output()).toContain(" vpcs.json     │ ✓      │ 3     ");
      expect(output()).toContain("1/2 files exported");
    });

    it("falls back to the configured region", async () => {
      vi.mocked(exportSnapshot).mockResolvedValue([]);
      await run("export", "-o", join(dir, "capture"));

      expect(exportSnapshot).toHaveBeenCalledWith(
        join(dir, "capture"),
        expect.objectContaining({ region: "us-east-1", profile: undefined }),
      );
    });
  });

  // ── diagram ───────────────────────────────────────────────────────────────

  describe("topology diagram", () => {
    it("prints the diagram to stdout", async () => {
      await run("diagram", "-i", dir);
      expect(output().split("\n")[0]).toBe("flowchart TB");
    });

    it("honors --max-routes", async () => {
      await run("diagram", "-i", dir, "--max-routes", "0");
      expect(output()).toContain("<br/><small>... +1 more</small>");
    });

    it("rejects a non-numeric --max-routes", async () => {
      await run("diagram", "-i", dir, "--max-routes", "many");
      expect(transport.messages("error")[0]?.startsWith('Invalid --max-routes value "many"')).toBe(true);
      expect(process.exitCode).toBe(1);
    });
  });
});
