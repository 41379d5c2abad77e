/**
 * Network Topology — Export Directory Loader
 *
 * Reads the JSON files of one export directory into record batches. Absent
 * files are empty batches; a file that does not parse is logged and treated
 * as empty. Only a missing directory is a hard failure.
 */

import { readFile, readdir, stat } from "node:fs/promises";
import { join } from "node:path";
import { TopologyInputError } from "../errors.js";
import type { PerRouteTable, RecordBatches } from "../ingest/batches.js";
import { fieldRecords, fieldString, isRecord, type RawRecord } from "../ingest/fields.js";
import type { TopologyLogger } from "../logging/index.js";
import { createSilentLogger } from "../logging/index.js";
import { LIST_FILES, METADATA_FILE, PER_ROUTE_TABLE_FILES } from "./export-files.js";

export type LoadExportOptions = {
  logger?: TopologyLogger;
  /** Overrides the account id recorded in metadata.json. */
  accountId?: string;
};

/** Placeholder the exporter writes when the caller identity is unavailable. */
const UNKNOWN_ACCOUNT = "unknown";

async function ensureDirectory(dir: string): Promise<void> {
  let isDir = false;
  try {
    isDir = (await stat(dir)).isDirectory();
  } catch (err) {
    throw new TopologyInputError(
      `Export directory not found: ${dir} (${err instanceof Error ? err.message : String(err)})`,
      dir,
    );
  }
  if (!isDir) throw new TopologyInputError(`Export path is not a directory: ${dir}`, dir);
}

/** Parsed top-level object of `file`, or null when absent or unreadable. */
export async function readJsonFile(
  dir: string,
  file: string,
  logger: TopologyLogger,
): Promise<RawRecord | null> {
  let text: string;
  try {
    text = await readFile(join(dir, file), "utf8");
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }

  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) return parsed;
    logger.warn(`Ignoring ${file}: top-level value is not an object`);
  } catch (err) {
    logger.warn(`Ignoring ${file}: invalid JSON`, { error: err instanceof Error ? err.message : String(err) });
  }
  return null;
}

function isMissingFile(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

export async function loadExportDirectory(dir: string, options: LoadExportOptions = {}): Promise<RecordBatches> {
  const logger = options.logger ?? createSilentLogger();
  await ensureDirectory(dir);

  const batches: RecordBatches = {};

  const metadata = await readJsonFile(dir, METADATA_FILE, logger);
  const recordedAccount = metadata ? fieldString(metadata, "aws_account_id") : "";
  batches.accountId = options.accountId ?? (recordedAccount === UNKNOWN_ACCOUNT ? "" : recordedAccount);

  for (const { file, envelope, batch } of LIST_FILES) {
    const data = await readJsonFile(dir, file, logger);
    const records = data ? fieldRecords(data, `${envelope}[]`) : [];
    batches[batch] = records;
    if (data) logger.debug(`Loaded ${file}`, { records: records.length });
  }

  const entries = (await readdir(dir)).filter((name) => name.endsWith(".json")).sort();
  for (const { prefix, envelope, batch } of PER_ROUTE_TABLE_FILES) {
    const perTable: PerRouteTable = {};
    for (const name of entries) {
      if (!name.startsWith(prefix)) continue;
      const routeTableId = name.slice(prefix.length, -".json".length);
      if (!routeTableId) continue;

      const data = await readJsonFile(dir, name, logger);
      perTable[routeTableId] = data ? fieldRecords(data, `${envelope}[]`) : [];
    }
    batches[batch] = perTable;
  }

  return batches;
}
