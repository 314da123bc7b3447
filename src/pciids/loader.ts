import type { Connector, ExecResult } from "../connectors/index.js";
import { MAX_OUTPUT_SIZE } from "../connectors/output.js";
import { toInventoryError } from "../errors/error-mapper.js";
import { InventoryError } from "../errors/inventory-error.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { PciDatabase } from "./database.js";
import { buildPciDatabase } from "./parser.js";

export const DEFAULT_PCI_IDS_PATH = "/usr/share/misc/pci.ids";

export interface LoadOptions {
  logger?: Logger;
  /** Milliseconds */
  timeout?: number;
}

/**
 * Read pci.ids text through the connector. Throws PCI_IDS_UNAVAILABLE when
 * the file cannot be read in full.
 */
export async function readPciIds(
  connector: Connector,
  path: string,
  timeout = 30000,
): Promise<string> {
  let result: ExecResult;
  try {
    result = await connector.execute(["cat", path], { timeout });
  } catch (error) {
    const mapped = toInventoryError(error);
    throw new InventoryError(
      `Failed to read ${path}: ${mapped.message}`,
      "PCI_IDS_UNAVAILABLE",
      "source_unavailable",
      mapped.remediation,
    );
  }

  if (result.exitCode !== 0) {
    throw new InventoryError(
      `Failed to read ${path}: ${result.stderr || `exit code ${result.exitCode}`}`,
      "PCI_IDS_UNAVAILABLE",
      "source_unavailable",
      "Install the pciutils/hwdata package or pass --pci-ids with the database location",
    );
  }
  if (result.truncated) {
    // A cut file would parse cleanly and silently lose every vendor past the cut
    throw new InventoryError(
      `Failed to read ${path}: output exceeded ${MAX_OUTPUT_SIZE} bytes`,
      "PCI_IDS_UNAVAILABLE",
      "source_unavailable",
      "Check that --pci-ids points at a pci.ids file",
    );
  }
  return result.stdout;
}

/**
 * Build a fresh database for one enrichment pass. An unreadable source is
 * logged once and yields an empty database, so every lookup misses.
 */
export async function loadPciDatabase(
  connector: Connector,
  path: string,
  options: LoadOptions = {},
): Promise<PciDatabase> {
  const logger = options.logger ?? silentLogger;
  let text: string;
  try {
    text = await readPciIds(connector, path, options.timeout);
  } catch (error) {
    logger.error(toInventoryError(error).message);
    return PciDatabase.empty(logger);
  }
  return buildPciDatabase(text, { logger });
}
