/**
 * Turns one device's raw udev attributes into a PciDeviceRecord, replacing
 * enumerator strings with pci.ids names wherever the database has them.
 *
 * Nothing here fails: a malformed id pair or a lookup miss keeps the
 * enumerator's own strings, and unknown ids come out as "0".
 */

import type { PciDatabase } from "../pciids/database.js";
import type { DeviceHandle } from "../devices/types.js";
import { silentLogger, type Logger } from "../utils/logger.js";
import { PCI_KEYS, type DeviceAttributes, type PciDeviceRecord } from "./types.js";

export const UNKNOWN_ID = "0";

export interface EnrichOptions {
  logger?: Logger;
}

/**
 * Split a "vvvv:dddd" attribute into lowercase parts. pci.ids keys are
 * lowercase whatever case the enumerator reports.
 */
export function splitIdPair(value: string): [string, string] | null {
  const parts = value.toLowerCase().split(":");
  if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
    return null;
  }
  return [parts[0], parts[1]];
}

export function readDeviceAttributes(handle: DeviceHandle): DeviceAttributes {
  const attrs: DeviceAttributes = {};
  for (const key of Object.values(PCI_KEYS)) {
    attrs[key] = handle.getValue(key);
  }
  return attrs;
}

export function enrichDevice(
  attrs: DeviceAttributes,
  db: PciDatabase,
  options: EnrichOptions = {},
): PciDeviceRecord {
  const logger = options.logger ?? silentLogger;
  const slot = attrs[PCI_KEYS.slot] ?? "";
  const label = slot || "device";

  const record: PciDeviceRecord = {
    pci_slot: slot,
    pci_class: attrs[PCI_KEYS.class] ?? "",
    driver: attrs[PCI_KEYS.driver] ?? "",
    vendor: attrs[PCI_KEYS.vendor] ?? "",
    model: attrs[PCI_KEYS.model] ?? "",
    vendor_id: "",
    model_id: "",
    subsystem_vendor_id: "",
    subsystem_vendor: "",
    subsystem_model_id: "",
    subsystem_model: "",
  };

  const rawId = attrs[PCI_KEYS.id] ?? "";
  const ids = splitIdPair(rawId);

  if (!ids) {
    if (rawId) logger.warn(`${label}: malformed ${PCI_KEYS.id} "${rawId}"`);
  } else {
    const [vendorId, modelId] = ids;
    record.vendor_id = vendorId;
    record.model_id = modelId;

    const vendor = db.vendorName(vendorId);
    if (vendor !== undefined) {
      record.vendor = vendor;
    } else {
      logger.warn(`${label}: vendor ${vendorId} not in pci.ids`);
    }

    const model = db.modelDescription(vendorId, modelId);
    if (model !== undefined) {
      record.model = model;
    } else {
      logger.warn(`${label}: model ${vendorId}:${modelId} not in pci.ids`);
    }

    const rawSubsys = attrs[PCI_KEYS.subsystemId] ?? "";
    const subsys = splitIdPair(rawSubsys);
    if (subsys) {
      const [subVendorId, subDeviceId] = subsys;
      record.subsystem_vendor_id = subVendorId;
      record.subsystem_model_id = subDeviceId;

      const subVendor = db.vendorName(subVendorId);
      if (subVendor !== undefined) {
        record.subsystem_vendor = subVendor;
      } else {
        logger.warn(`${label}: subsystem vendor ${subVendorId} not in pci.ids`);
      }

      const subModel = db.subsystemDescription(vendorId, modelId, subVendorId, subDeviceId);
      if (subModel !== undefined) {
        record.subsystem_model = subModel;
      } else {
        logger.warn(`${label}: subsystem ${subVendorId} ${subDeviceId} not listed under ${vendorId}:${modelId}`);
      }
    } else if (rawSubsys) {
      logger.warn(`${label}: malformed ${PCI_KEYS.subsystemId} "${rawSubsys}"`);
    }
  }

  if (record.vendor_id === "") record.vendor_id = UNKNOWN_ID;
  if (record.model_id === "") record.model_id = UNKNOWN_ID;

  return record;
}
