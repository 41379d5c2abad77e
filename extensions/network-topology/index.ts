/**
 * Transit Gateway Network Topology — Package Entry Point
 *
 * Reconstructs one AWS Transit Gateway network from per-resource-type
 * describe/list exports, classifies subnets, and reports routing and
 * hybrid-connectivity defects.
 */

// Core
export { TopologyCatalog } from "./src/catalog.js";
export {
  accountMode,
  attachmentOwnerDisplay,
  bgpCounts,
  bgpStatus,
  bgpSummary,
  catalogStats,
  crossAccountAttachments,
  isHubAccount,
  isSpokeAccount,
  localAttachments,
  referencedTgwIds,
  routeDestination,
  tunnelCounts,
  tunnelStatus,
  tunnelSummary,
} from "./src/catalog.js";
export type { AccountMode, BgpStatus, CatalogStats, TunnelStatus, UpCount } from "./src/catalog.js";
export type * from "./src/types.js";

export { normalizeRecords } from "./src/ingest/normalizer.js";
export type { NormalizeResult } from "./src/ingest/normalizer.js";
export type { RecordBatches, PerRouteTable } from "./src/ingest/batches.js";
export type { RawRecord } from "./src/ingest/fields.js";
export { resolveRouteTarget } from "./src/ingest/route-target.js";
export { correlate } from "./src/correlate/correlator.js";
export type { CorrelationResult } from "./src/correlate/correlator.js";
export { classifySubnets, classifyRoutes } from "./src/classify/subnet-classifier.js";
export {
  ANALYZER_CHECKS,
  analyzeTopology,
  canReach,
  findingsAtLeast,
  summarizeFindings,
} from "./src/analysis/analyzer.js";
export type { AnalyzerCheck, AnalyzerOptions, FindingSummary } from "./src/analysis/analyzer.js";
export { cidrMatches, cidrsOverlap } from "./src/analysis/cidr.js";
export { buildTopology } from "./src/pipeline.js";
export type { BuildTopologyOptions, TopologyResult } from "./src/pipeline.js";

// Edges
export { loadExportDirectory } from "./src/loader/export-dir.js";
export { exportSnapshot } from "./src/exporter/snapshot.js";
export type { ExportFileResult, ExportSnapshotOptions, SnapshotClients } from "./src/exporter/snapshot.js";
export { formatConsoleSummary } from "./src/reporting/summary.js";
export { formatMarkdownReport } from "./src/reporting/markdown.js";
export { generateMermaid } from "./src/reporting/mermaid.js";
export { toJsonSnapshot } from "./src/reporting/json.js";
export type { TopologySnapshot } from "./src/reporting/json.js";
export { registerTopologyCli } from "./src/cli/cli.js";
export type { CliContext } from "./src/cli/cli.js";

// Ambient
export { configSchema, getDefaultConfig, resolveConfig } from "./src/config.js";
export type { TopologyConfig, TopologyConfigInput } from "./src/config.js";
export { TopologyConfigError, TopologyInputError } from "./src/errors.js";
export { createSilentLogger, createTopologyLogger } from "./src/logging/index.js";
export type { TopologyLogger, TopologyLogLevel } from "./src/logging/index.js";
