import type { HandlerDeps } from "./types.js";
import type { LookupPciIdArgs } from "../schemas/tools.js";
import { formatResponse, formatError } from "../response.js";
import { InventoryError } from "../errors/inventory-error.js";
import { toInventoryError } from "../errors/error-mapper.js";
import { buildPciDatabase, readPciIds, subsystemKey } from "../pciids/index.js";

export async function handleLookupPciId(
  deps: HandlerDeps,
  args: LookupPciIdArgs,
) {
  const startTime = Date.now();
  const { connector, config, logger } = deps;
  const { vendor_id, model_id, subsystem_vendor_id, subsystem_device_id } = args;

  const hasSubsystem = subsystem_vendor_id !== undefined || subsystem_device_id !== undefined;
  if (hasSubsystem && (model_id === undefined || subsystem_vendor_id === undefined || subsystem_device_id === undefined)) {
    return formatError("lookup_pci_id", new InventoryError(
      "A subsystem lookup needs model_id, subsystem_vendor_id and subsystem_device_id",
      "INVALID_INPUT",
      "validation",
      "Pass all three ids, or drop the subsystem ids",
    ), startTime);
  }

  try {
    const text = await readPciIds(connector, args.pci_ids_path ?? config.pciIdsPath, config.timeout * 1000);
    const db = buildPciDatabase(text, { logger });

    const vendor = db.vendorName(vendor_id);
    if (vendor === undefined) {
      return formatError("lookup_pci_id", new InventoryError(
        `Vendor ${vendor_id} is not in pci.ids`,
        "VENDOR_NOT_FOUND",
        "not_found",
        "Check the id, or update pci.ids (update-pciids)",
      ), startTime);
    }

    if (model_id === undefined) {
      return formatResponse("lookup_pci_id", { vendor_id, vendor }, startTime);
    }

    const model = db.modelDescription(vendor_id, model_id);
    if (model === undefined) {
      return formatError("lookup_pci_id", new InventoryError(
        `Device ${vendor_id}:${model_id} is not in pci.ids`,
        "MODEL_NOT_FOUND",
        "not_found",
        "Check the id, or update pci.ids (update-pciids)",
      ), startTime);
    }

    if (subsystem_vendor_id === undefined || subsystem_device_id === undefined) {
      return formatResponse("lookup_pci_id", {
        vendor_id,
        vendor,
        model_id,
        model,
        description: model,
      }, startTime);
    }

    return formatResponse("lookup_pci_id", {
      vendor_id,
      vendor,
      model_id,
      model,
      subsystem_vendor_id,
      subsystem_device_id,
      subsystem_vendor: db.vendorName(subsystem_vendor_id) ?? null,
      subsystem: db.subsystemDescription(vendor_id, model_id, subsystem_vendor_id, subsystem_device_id) ?? null,
      description: db.modelDescription(vendor_id, model_id, subsystemKey(subsystem_vendor_id, subsystem_device_id)),
    }, startTime);
  } catch (error) {
    return formatError("lookup_pci_id", toInventoryError(error, config.mode), startTime);
  }
}
