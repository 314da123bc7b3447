import { z } from "zod";

/** 1-4 hex digits, normalized to the 4-digit lowercase form pci.ids uses. */
export const hexIdSchema = z
  .string()
  .trim()
  .regex(/^(0x)?[0-9a-fA-F]{1,4}$/, "Expected 1-4 hexadecimal digits, e.g. '8086'")
  .transform((id) => id.replace(/^0x/, "").toLowerCase().padStart(4, "0"));

const pciIdsPathField = z
  .string()
  .min(1)
  .optional()
  .describe("Path of the pci.ids database on the target system (default: server setting)");

export const listPciDevicesSchema = z.object({
  pci_ids_path: pciIdsPathField,
});
export type ListPciDevicesArgs = z.input<typeof listPciDevicesSchema>;

export const lookupPciIdSchema = z.object({
  vendor_id: hexIdSchema.describe("Vendor id, e.g. '8086'"),
  model_id: hexIdSchema.optional().describe("Device (model) id under the vendor, e.g. '1237'"),
  subsystem_vendor_id: hexIdSchema.optional().describe("Subsystem vendor id; needs model_id and subsystem_device_id"),
  subsystem_device_id: hexIdSchema.optional().describe("Subsystem device id; needs model_id and subsystem_vendor_id"),
  pci_ids_path: pciIdsPathField,
});
export type LookupPciIdArgs = z.output<typeof lookupPciIdSchema>;

export const getPciIdsInfoSchema = z.object({
  pci_ids_path: pciIdsPathField,
});
export type GetPciIdsInfoArgs = z.input<typeof getPciIdsInfoSchema>;
