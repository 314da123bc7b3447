/**
 * Seam to the device enumerator. A source lists the devices on the PCI bus
 * and hands out one short-lived handle per device; callers must `close()`
 * every handle they open.
 */

export interface DeviceHandle {
  readonly syspath: string;
  /** Raw attribute value, "" when the device does not export it. */
  getValue(key: string): string;
  close(): Promise<void>;
}

export interface DeviceSource {
  /** Syspaths of every PCI device. Throws when the enumerator is unavailable. */
  scan(): Promise<string[]>;
  /** `null` when this one device cannot be opened. */
  open(syspath: string): Promise<DeviceHandle | null>;
}
