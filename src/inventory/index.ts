export { collectPciDevices, type CollectOptions } from "./collect.js";
export { enrichDevice, readDeviceAttributes, splitIdPair, UNKNOWN_ID, type EnrichOptions } from "./enrich.js";
export { PCI_KEYS, type DeviceAttributes, type PciDeviceRecord, type PciKey } from "./types.js";
