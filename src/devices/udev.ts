import type { Connector, ExecResult } from "../connectors/index.js";
import { toInventoryError } from "../errors/error-mapper.js";
import { InventoryError } from "../errors/inventory-error.js";
import { parseTriggerSyspaths, parseUdevProperties } from "../parsers/udevadm.js";
import type { DeviceHandle, DeviceSource } from "./types.js";

class UdevDeviceHandle implements DeviceHandle {
  readonly syspath: string;
  private properties: Map<string, string> | null;

  constructor(syspath: string, properties: Map<string, string>) {
    this.syspath = syspath;
    this.properties = properties;
  }

  getValue(key: string): string {
    return this.properties?.get(key) ?? "";
  }

  async close(): Promise<void> {
    this.properties = null;
  }
}

/**
 * Enumerates the PCI bus with udevadm, run through a connector so the same
 * code serves the local host, a container or an SSH target.
 */
export class UdevDeviceSource implements DeviceSource {
  private connector: Connector;
  private timeout: number;

  constructor(connector: Connector, timeout = 30000) {
    this.connector = connector;
    this.timeout = timeout;
  }

  async scan(): Promise<string[]> {
    const command = ["udevadm", "trigger", "--dry-run", "--verbose", "--subsystem-match=pci"];
    let result: ExecResult;
    try {
      result = await this.connector.execute(command, { timeout: this.timeout });
    } catch (error) {
      const mapped = toInventoryError(error);
      throw new InventoryError(
        `Could not enumerate PCI devices: ${mapped.message}`,
        "ENUMERATOR_UNAVAILABLE",
        "enumeration",
        mapped.remediation,
      );
    }

    if (result.exitCode !== 0) {
      throw new InventoryError(
        `Could not enumerate PCI devices: ${result.stderr || `udevadm exited with ${result.exitCode}`}`,
        "ENUMERATOR_UNAVAILABLE",
        "enumeration",
        "Check that udev is installed and /sys is mounted on the target",
      );
    }

    return parseTriggerSyspaths(result.stdout);
  }

  async open(syspath: string): Promise<DeviceHandle | null> {
    const result = await this.connector.execute(
      ["udevadm", "info", "--query=property", `--path=${syspath}`],
      { timeout: this.timeout },
    );
    if (result.exitCode !== 0) {
      return null;
    }
    return new UdevDeviceHandle(syspath, parseUdevProperties(result.stdout));
  }
}
