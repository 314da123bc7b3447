/**
 * Read-only lookups over a built pci.ids database.
 *
 * Ids must already be lowercase hex; no case folding happens here.
 * A miss is reported as `undefined`.
 */

import type { PciDatabaseStats, PciModel, PciVendor } from "./types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/** Build the subsystem key used inside `PciModel.subsystemInfo`. */
export function subsystemKey(subsystemVendorId: string, subsystemDeviceId: string): string {
  return `${subsystemVendorId} ${subsystemDeviceId}`;
}

export class PciDatabase {
  private readonly vendors: ReadonlyMap<string, PciVendor>;
  private readonly logger: Logger;

  constructor(vendors: ReadonlyMap<string, PciVendor>, logger: Logger = silentLogger) {
    this.vendors = vendors;
    this.logger = logger;
  }

  static empty(logger?: Logger): PciDatabase {
    return new PciDatabase(new Map(), logger);
  }

  vendor(vendorId: string): PciVendor | undefined {
    return this.vendors.get(vendorId);
  }

  model(vendorId: string, modelId: string): PciModel | undefined {
    return this.vendors.get(vendorId)?.models.get(modelId);
  }

  vendorName(vendorId: string): string | undefined {
    return this.vendor(vendorId)?.name;
  }

  /**
   * Model description, optionally merged with a subsystem description as
   * `"<model>, <subsystem>"`. An unknown subsystem key leaves the model
   * description as is.
   */
  modelDescription(vendorId: string, modelId: string, subsystem?: string): string | undefined {
    const model = this.model(vendorId, modelId);
    if (!model) return undefined;
    if (subsystem === undefined) return model.desc;

    const sub = model.subsystemInfo.get(subsystem);
    if (sub === undefined) {
      this.logger.warn(`Subsystem ${subsystem} not found under ${vendorId}:${modelId}`);
      return model.desc;
    }
    return `${model.desc}, ${sub}`;
  }

  subsystemDescription(
    vendorId: string,
    modelId: string,
    subsystemVendorId: string,
    subsystemDeviceId: string,
  ): string | undefined {
    return this.model(vendorId, modelId)?.subsystemInfo.get(
      subsystemKey(subsystemVendorId, subsystemDeviceId),
    );
  }

  isEmpty(): boolean {
    return this.vendors.size === 0;
  }

  stats(): PciDatabaseStats {
    let models = 0;
    let subsystems = 0;
    for (const vendor of this.vendors.values()) {
      models += vendor.models.size;
      for (const model of vendor.models.values()) {
        subsystems += model.subsystemInfo.size;
      }
    }
    return { vendors: this.vendors.size, models, subsystems };
  }
}
