#!/usr/bin/env node

import { createRequire } from "node:module";
import { listDevices, startServer } from "./index.js";
import { parseArgs } from "./config.js";
import { DEFAULT_PCI_IDS_PATH } from "./pciids/index.js";

function printHelp() {
  console.log(`
pci-inventory-mcp - PCI device inventory enriched from the pci.ids database

USAGE:
  pci-inventory-mcp [OPTIONS]

OPTIONS:
  --mode <mode>           Connection mode: local, docker, or ssh (default: local)
  --container <name>      Docker container name/ID (for docker mode)
  --host <host>           SSH host (for ssh mode)
  --user <user>           SSH user (default: root)
  --port <port>           SSH port (default: 22)
  --password <pass>       SSH password (uses SSH agent if omitted)
  --pci-ids <path>        pci.ids location on the target (default: ${DEFAULT_PCI_IDS_PATH},
                          or PCI_IDS_PATH)
  --timeout <seconds>     Per-command timeout (default: 60)
  --log-level <level>     debug, info, warn, error or silent (default: warn,
                          or PCI_INVENTORY_LOG_LEVEL)
  --list                  Print the device list as JSON and exit instead of serving MCP
  -h, --help              Show this help message
  -v, --version           Show version

EXAMPLES:
  # MCP server over stdio for the local host
  pci-inventory-mcp

  # One-shot listing of a remote host
  pci-inventory-mcp --mode=ssh --host=10.0.0.5 --list
`);
}

async function main() {
  const options = parseArgs();

  if (options.help) {
    printHelp();
    return;
  }

  if (options.version) {
    const _require = createRequire(import.meta.url);
    const { version } = _require("../package.json") as { version: string };
    console.log(`pci-inventory-mcp v${version}`);
    return;
  }

  if (options.list) {
    const devices = await listDevices(options.config);
    console.log(JSON.stringify(devices, null, 2));
    return;
  }

  await startServer(options.config);
}

main().catch((error) => {
  console.error("Failed to start:", error);
  process.exit(1);
});
