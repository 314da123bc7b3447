import type { Connector } from "../connectors/index.js";
import type { DeviceHandle, DeviceSource } from "../devices/types.js";
import { UdevDeviceSource } from "../devices/udev.js";
import { toInventoryError } from "../errors/error-mapper.js";
import { loadPciDatabase } from "../pciids/loader.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { enrichDevice, readDeviceAttributes } from "./enrich.js";
import type { PciDeviceRecord } from "./types.js";

export interface CollectOptions {
  connector: Connector;
  pciIdsPath: string;
  /** Defaults to udevadm over `connector`. */
  source?: DeviceSource;
  logger?: Logger;
  /** Per-command timeout in milliseconds */
  timeout?: number;
}

/**
 * One inventory pass: build a fresh pci.ids database, then enrich every PCI
 * device in scan order.
 *
 * If the bus cannot be enumerated at all the result is empty. A device whose
 * handle cannot be opened or read is left out; every other device yields a
 * record, enriched or not.
 */
export async function collectPciDevices(options: CollectOptions): Promise<PciDeviceRecord[]> {
  const logger = options.logger ?? silentLogger;
  const source = options.source ?? new UdevDeviceSource(options.connector, options.timeout);

  const db = await loadPciDatabase(options.connector, options.pciIdsPath, {
    logger,
    timeout: options.timeout,
  });

  let syspaths: string[];
  try {
    syspaths = await source.scan();
  } catch (error) {
    logger.error(toInventoryError(error).message);
    return [];
  }

  const records: PciDeviceRecord[] = [];

  for (const syspath of syspaths) {
    let handle: DeviceHandle | null;
    try {
      handle = await source.open(syspath);
    } catch (error) {
      logger.warn(`Could not open ${syspath}: ${toInventoryError(error).message}`);
      continue;
    }
    if (!handle) {
      logger.warn(`Could not open ${syspath}`);
      continue;
    }

    try {
      records.push(enrichDevice(readDeviceAttributes(handle), db, { logger }));
    } catch (error) {
      logger.warn(`Could not read ${syspath}: ${toInventoryError(error).message}`);
    } finally {
      await handle.close().catch((error: unknown) => {
        logger.warn(`Could not close ${syspath}: ${toInventoryError(error).message}`);
      });
    }
  }

  logger.debug(`Collected ${records.length} of ${syspaths.length} PCI devices`);
  return records;
}
