/**
 * pci.ids vendor/device database: parsing, loading and lookups.
 */

export { PciDatabase, subsystemKey } from "./database.js";
export { buildPciDatabase, END_OF_VENDORS, type BuildOptions } from "./parser.js";
export { loadPciDatabase, readPciIds, DEFAULT_PCI_IDS_PATH, type LoadOptions } from "./loader.js";
export type { PciVendor, PciModel, PciDatabaseStats } from "./types.js";
