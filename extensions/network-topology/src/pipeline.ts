/**
 * Network Topology — Pipeline
 *
 * normalize → correlate → classify → analyze, on a fresh catalog per call.
 */

import type { AnalyzerOptions } from "./analysis/analyzer.js";
import { analyzeTopology, summarizeFindings } from "./analysis/analyzer.js";
import { TopologyCatalog, accountMode } from "./catalog.js";
import { classifySubnets } from "./classify/subnet-classifier.js";
import { correlate } from "./correlate/correlator.js";
import type { RecordBatches } from "./ingest/batches.js";
import { normalizeRecords } from "./ingest/normalizer.js";
import type { TopologyLogger } from "./logging/index.js";
import { createSilentLogger } from "./logging/index.js";
import type { Finding } from "./types.js";

export type BuildTopologyOptions = {
  logger?: TopologyLogger;
  analyzer?: AnalyzerOptions;
};

export type TopologyResult = {
  catalog: TopologyCatalog;
  findings: Finding[];
};

export function buildTopology(batches: RecordBatches, options: BuildTopologyOptions = {}): TopologyResult {
  const logger = options.logger ?? createSilentLogger();
  const catalog = new TopologyCatalog(batches.accountId ?? "");

  const normalized = normalizeRecords(catalog, batches);
  if (normalized.skipped > 0) {
    logger.warn(`Skipped ${normalized.skipped} record(s) without an id`);
  }
  for (const rtId of normalized.orphanRouteBatches) {
    logger.debug(`Routes for unknown TGW route table ${rtId} ignored`);
  }

  correlate(catalog, batches, logger.child("correlate"));

  const classes = classifySubnets(catalog);
  logger.debug("Subnets classified", classes);

  const findings = analyzeTopology(catalog, options.analyzer);
  const summary = summarizeFindings(findings);

  logger.info(`Topology built (${accountMode(catalog)} account)`, {
    transitGateways: catalog.transitGateways.size,
    attachments: catalog.tgwAttachments.size,
    vpcs: catalog.vpcs.size,
    findings: summary.total,
    errors: summary.bySeverity.error,
    warnings: summary.bySeverity.warning,
  });

  return { catalog, findings };
}
