import type { HandlerDeps } from "./types.js";
import type { GetPciIdsInfoArgs } from "../schemas/tools.js";
import { formatResponse, formatError } from "../response.js";
import { toInventoryError } from "../errors/error-mapper.js";
import { buildPciDatabase, readPciIds } from "../pciids/index.js";

export async function handleGetPciIdsInfo(
  deps: HandlerDeps,
  args: GetPciIdsInfoArgs,
) {
  const startTime = Date.now();
  const { connector, config, logger } = deps;
  const pciIdsPath = args.pci_ids_path ?? config.pciIdsPath;

  try {
    const text = await readPciIds(connector, pciIdsPath, config.timeout * 1000);
    const db = buildPciDatabase(text, { logger });

    return formatResponse("get_pci_ids_info", {
      pci_ids_path: pciIdsPath,
      ...db.stats(),
    }, startTime);
  } catch (error) {
    return formatError("get_pci_ids_info", toInventoryError(error, config.mode), startTime);
  }
}
