/**
 * Maps raw/unknown errors into structured InventoryError instances.
 */

import { InventoryError } from "./inventory-error.js";

export function toInventoryError(raw: unknown, mode?: "docker" | "ssh" | "local"): InventoryError {
  if (raw instanceof InventoryError) {
    return raw;
  }

  const msg = raw instanceof Error ? raw.message : String(raw);

  if (/is not running|not running/i.test(msg)) {
    const remediation =
      mode === "ssh" ? "Check SSH connectivity to the target host" :
      mode === "local" ? "Check that udevadm exists and PATH is correct" :
      "Start the container or check its status with `docker ps`";
    return new InventoryError(msg, "CONNECTION_FAILED", "connection", remediation);
  }

  if (/ECONNREFUSED/i.test(msg)) {
    return new InventoryError(
      msg,
      "CONNECTION_FAILED",
      "connection",
      "Check SSH host/port configuration",
    );
  }

  if (/ENOENT/.test(msg)) {
    return new InventoryError(
      msg,
      "COMMAND_NOT_FOUND",
      "not_found",
      "Install udev (udevadm) and coreutils on the target system",
    );
  }

  if (/timed? ?out/i.test(msg)) {
    return new InventoryError(
      msg,
      "COMMAND_TIMEOUT",
      "timeout",
      "Increase --timeout",
    );
  }

  return new InventoryError(msg, "UNKNOWN_ERROR", "enumeration");
}
