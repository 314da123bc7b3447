import type { HandlerDeps } from "./types.js";
import type { ListPciDevicesArgs } from "../schemas/tools.js";
import { formatResponse, formatError } from "../response.js";
import { toInventoryError } from "../errors/error-mapper.js";
import { collectPciDevices } from "../inventory/index.js";

export async function handleListPciDevices(
  deps: HandlerDeps,
  args: ListPciDevicesArgs,
) {
  const startTime = Date.now();
  const { connector, config, logger } = deps;
  const pciIdsPath = args.pci_ids_path ?? config.pciIdsPath;

  try {
    const devices = await collectPciDevices({
      connector,
      pciIdsPath,
      logger,
      timeout: config.timeout * 1000,
    });

    return formatResponse("list_pci_devices", {
      pci_ids_path: pciIdsPath,
      devices,
      device_count: devices.length,
    }, startTime);
  } catch (error) {
    return formatError("list_pci_devices", toInventoryError(error, config.mode), startTime);
  }
}
