/**
 * In-memory shape of a pci.ids vendor/device database.
 */

/** A product id scoped to its owning vendor. */
export interface PciModel {
  /** 4 lowercase hex digits */
  readonly id: string;
  readonly desc: string;
  /** Keyed by "<subvendor> <subdevice>", e.g. "1028 04da". */
  readonly subsystemInfo: ReadonlyMap<string, string>;
}

/** A hardware manufacturer. */
export interface PciVendor {
  /** 4 lowercase hex digits */
  readonly id: string;
  readonly name: string;
  readonly models: ReadonlyMap<string, PciModel>;
}

export interface PciDatabaseStats {
  vendors: number;
  models: number;
  subsystems: number;
}
