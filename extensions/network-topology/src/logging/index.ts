/**
 * Network Topology Logging Module Index
 */

export {
  type TopologyLogLevel,
  type TopologyLogEntry,
  type LogFormatter,
  type LogTransport,
  type TopologyLogger,
  LOG_LEVELS,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  TopologyLoggerImpl,
  createTopologyLogger,
  createSilentLogger,
} from "./logger.js";
