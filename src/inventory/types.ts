/** udev property names read for each PCI device. */
export const PCI_KEYS = {
  slot: "PCI_SLOT_NAME",
  class: "ID_PCI_CLASS_FROM_DATABASE",
  vendor: "ID_VENDOR_FROM_DATABASE",
  model: "ID_MODEL_FROM_DATABASE",
  id: "PCI_ID",
  driver: "DRIVER",
  subsystemId: "PCI_SUBSYS_ID",
} as const;

export type PciKey = (typeof PCI_KEYS)[keyof typeof PCI_KEYS];

/** Raw attributes as the enumerator reports them; case is not guaranteed. */
export type DeviceAttributes = Partial<Record<PciKey, string>>;

/**
 * One enriched device. `vendor_id`/`model_id` are lowercase hex, or "0"
 * when unknown; subsystem fields are "" when unknown.
 */
export interface PciDeviceRecord {
  pci_slot: string;
  pci_class: string;
  driver: string;
  vendor: string;
  model: string;
  vendor_id: string;
  model_id: string;
  subsystem_vendor_id: string;
  subsystem_vendor: string;
  subsystem_model_id: string;
  subsystem_model: string;
}
