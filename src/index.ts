import { createRequire } from "node:module";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createConnector, type ConnectorConfig } from "./connectors/index.js";
import {
  listPciDevicesSchema,
  lookupPciIdSchema,
  getPciIdsInfoSchema,
} from "./schemas/tools.js";
import type { HandlerDeps } from "./handlers/types.js";
import { handleListPciDevices } from "./handlers/list-pci-devices.js";
import { handleLookupPciId } from "./handlers/lookup-pci-id.js";
import { handleGetPciIdsInfo } from "./handlers/get-pci-ids-info.js";
import { collectPciDevices, type PciDeviceRecord } from "./inventory/index.js";
import { createLogger, type Logger, type LogLevel } from "./utils/logger.js";

export interface ServerConfig extends ConnectorConfig {
  pciIdsPath: string;
  /** Per-command timeout in seconds */
  timeout: number;
  logLevel?: LogLevel;
  /** Overrides the stderr logger built from `logLevel`. */
  logger?: Logger;
}

function resolveLogger(config: ServerConfig): Logger {
  return config.logger ?? createLogger({ level: config.logLevel });
}

export async function createServer(config: ServerConfig) {
  const _require = createRequire(import.meta.url);
  const { version: pkgVersion } = _require("../package.json") as { version: string };
  const server = new McpServer(
    {
      name: "pci-inventory-mcp",
      version: pkgVersion,
    },
    {
      instructions:
        "This server lists the PCI devices of a Linux system and names them from the pci.ids " +
        "vendor/device database. vendor_id and model_id are \"0\" when the bus did not report a " +
        "usable id; vendor and model then hold whatever udev reported. Subsystem fields are empty " +
        "when unknown.",
    },
  );

  const connector = await createConnector(config);

  const deps: HandlerDeps = {
    connector,
    config: {
      pciIdsPath: config.pciIdsPath,
      timeout: config.timeout,
      mode: config.mode,
    },
    logger: resolveLogger(config),
  };

  // Tool: list_pci_devices - Enumerate and enrich every PCI device
  server.tool(
    "list_pci_devices",
    "List every PCI device with slot, class, driver, vendor/model names and ids, and subsystem " +
    "vendor/model. Names come from pci.ids where it has them, otherwise from udev.",
    listPciDevicesSchema.shape,
    (args) => handleListPciDevices(deps, args)
  );

  // Tool: lookup_pci_id - Resolve ids against pci.ids
  server.tool(
    "lookup_pci_id",
    "Look up a vendor id, a vendor:device pair, or a vendor:device pair plus subsystem ids in pci.ids. " +
    "`description` joins the device and subsystem names as \"<device>, <subsystem>\".",
    lookupPciIdSchema.shape,
    (args) => handleLookupPciId(deps, args)
  );

  // Tool: get_pci_ids_info - Database statistics
  server.tool(
    "get_pci_ids_info",
    "Parse pci.ids on the target and report how many vendors, devices and subsystems it lists.",
    getPciIdsInfoSchema.shape,
    (args) => handleGetPciIdsInfo(deps, args)
  );

  return server;
}

/** `--list` mode: one inventory pass, records only. */
export async function listDevices(config: ServerConfig): Promise<PciDeviceRecord[]> {
  const connector = await createConnector(config);
  try {
    return await collectPciDevices({
      connector,
      pciIdsPath: config.pciIdsPath,
      logger: resolveLogger(config),
      timeout: config.timeout * 1000,
    });
  } finally {
    await connector.disconnect();
  }
}

export async function startServer(config: ServerConfig) {
  const server = await createServer(config);
  const transport = new StdioServerTransport();
  await server.connect(transport);

  const shutdown = async () => {
    try {
      await server.close();
    } catch (error) {
      console.error("Error during shutdown:", error);
    }
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());

  console.error(`PCI inventory MCP server started (${config.mode} mode, pci.ids at ${config.pciIdsPath})`);
}
