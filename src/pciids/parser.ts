/**
 * Parser for the pci.ids vendor/device database.
 *
 * The file is a flat list where indentation encodes the level:
 *
 *   1af4  Red Hat, Inc.
 *   \t1000  Virtio network device
 *   \t\t1af4 0001  Virtio network device
 *
 * A model belongs to the last vendor line above it and a subsystem to the
 * last model line, so the parser walks the file as a small state machine.
 * Malformed lines are skipped with a warning; nothing here throws.
 */

import { PciDatabase } from "./database.js";
import type { PciModel, PciVendor } from "./types.js";
import { silentLogger, type Logger } from "../utils/logger.js";

/** Vendor id that starts the device-class section, which is not parsed. */
export const END_OF_VENDORS = "ffff";

const MIN_LINE_LENGTH = 7;
const VENDOR_NAME_OFFSET = 6;
const MODEL_DESC_OFFSET = 7;
const SUBSYSTEM_KEY_LENGTH = 9;
const SUBSYSTEM_DESC_OFFSET = 13;

interface ModelDraft {
  id: string;
  desc: string;
  subsystemInfo: Map<string, string>;
}

interface VendorDraft {
  id: string;
  name: string;
  models: Map<string, ModelDraft>;
}

type ParserState =
  | { kind: "AwaitingVendor" }
  | { kind: "InVendor"; vendor: VendorDraft }
  | { kind: "InVendorAndModel"; vendor: VendorDraft; model: ModelDraft };

export interface BuildOptions {
  logger?: Logger;
}

function splitLines(source: string | Iterable<string>): Iterable<string> {
  return typeof source === "string" ? source.split("\n") : source;
}

function freeze(vendors: Map<string, VendorDraft>): Map<string, PciVendor> {
  const out = new Map<string, PciVendor>();
  for (const [id, vendor] of vendors) {
    const models = new Map<string, PciModel>();
    for (const [modelId, model] of vendor.models) {
      models.set(modelId, Object.freeze({ ...model }));
    }
    out.set(id, Object.freeze({ id: vendor.id, name: vendor.name, models }));
  }
  return out;
}

/**
 * Build a database from pci.ids text, or from an iterable of its lines.
 */
export function buildPciDatabase(
  source: string | Iterable<string>,
  options: BuildOptions = {},
): PciDatabase {
  const logger = options.logger ?? silentLogger;
  const vendors = new Map<string, VendorDraft>();
  let state: ParserState = { kind: "AwaitingVendor" };
  let lineNo = 0;
  let skipped = 0;
  let reachedEnd = false;

  const skip = (message: string) => {
    skipped++;
    logger.warn(`pci.ids line ${lineNo}: ${message}`);
  };

  for (const raw of splitLines(source)) {
    lineNo++;
    const line = raw.endsWith("\r") ? raw.slice(0, -1) : raw;

    if (line.length < MIN_LINE_LENGTH || line.startsWith("#")) {
      continue;
    }

    const offset = line.search(/[0-9a-f]/);

    if (offset === 0) {
      const id = line.slice(0, 4);
      if (id === END_OF_VENDORS) {
        reachedEnd = true;
        break;
      }
      // A repeated vendor id replaces the earlier entry, models included.
      const vendor: VendorDraft = { id, name: line.slice(VENDOR_NAME_OFFSET), models: new Map() };
      vendors.set(id, vendor);
      state = { kind: "InVendor", vendor };
    } else if (offset === 1) {
      if (state.kind === "AwaitingVendor") {
        skip(`model ${line.slice(1, 5)} appears before any vendor`);
      } else if (line.length <= MODEL_DESC_OFFSET) {
        skip("model line too short");
      } else {
        const model: ModelDraft = {
          id: line.slice(1, 5),
          desc: line.slice(MODEL_DESC_OFFSET),
          subsystemInfo: new Map(),
        };
        state.vendor.models.set(model.id, model);
        state = { kind: "InVendorAndModel", vendor: state.vendor, model };
      }
    } else if (offset === 2) {
      const key = line.slice(2, 2 + SUBSYSTEM_KEY_LENGTH);
      if (state.kind !== "InVendorAndModel") {
        skip(`subsystem ${key} appears before any model of the current vendor`);
      } else if (line.length <= 2 + SUBSYSTEM_KEY_LENGTH) {
        skip("subsystem line too short");
      } else {
        state.model.subsystemInfo.set(key, line.slice(SUBSYSTEM_DESC_OFFSET));
      }
    } else {
      skip("unexpected line format");
    }
  }

  const db = new PciDatabase(freeze(vendors), logger);
  const { vendors: v, models, subsystems } = db.stats();
  logger.debug(
    `Parsed pci.ids: ${v} vendors, ${models} models, ${subsystems} subsystems, ` +
    `${skipped} lines skipped${reachedEnd ? ", stopped at ffff" : ""}`,
  );
  return db;
}
