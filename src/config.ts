/**
 * Command-line and environment configuration.
 */

import type { ServerConfig } from "./index.js";
import { DEFAULT_PCI_IDS_PATH } from "./pciids/index.js";
import { isLogLevel } from "./utils/logger.js";

export interface CliOptions {
  config: ServerConfig;
  list: boolean;
  help: boolean;
  version: boolean;
}

export function parseArgs(
  args: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): CliOptions {
  const config: ServerConfig = {
    mode: "local",
    pciIdsPath: env.PCI_IDS_PATH || DEFAULT_PCI_IDS_PATH,
    timeout: 60,
  };
  if (isLogLevel(env.PCI_INVENTORY_LOG_LEVEL)) {
    config.logLevel = env.PCI_INVENTORY_LOG_LEVEL;
  }
  const options: CliOptions = { config, list: false, help: false, version: false };

  for (let i = 0; i < args.length; i++) {
    let arg = args[i];
    let value: string | undefined = args[i + 1];
    let usedEqualsSyntax = false;

    // Support --flag=value syntax: split on first '='
    if (arg.startsWith("--") && arg.includes("=")) {
      const eqIndex = arg.indexOf("=");
      value = arg.slice(eqIndex + 1);
      arg = arg.slice(0, eqIndex);
      usedEqualsSyntax = true;
    }

    // Only skip the next arg if the value came from it
    const consumeValue = () => { if (!usedEqualsSyntax) i++; };

    switch (arg) {
      case "--mode":
        if (value === "docker" || value === "ssh" || value === "local") {
          config.mode = value;
        }
        consumeValue();
        break;
      case "--container":
        config.container = value;
        consumeValue();
        break;
      case "--host":
        config.host = value;
        consumeValue();
        break;
      case "--user":
        config.user = value;
        consumeValue();
        break;
      case "--port":
        config.port = parseInt(value ?? "", 10) || undefined;
        consumeValue();
        break;
      case "--password":
        config.password = value;
        consumeValue();
        break;
      case "--pci-ids":
        if (value) config.pciIdsPath = value;
        consumeValue();
        break;
      case "--timeout": {
        const seconds = parseInt(value ?? "", 10);
        if (seconds > 0) config.timeout = seconds;
        consumeValue();
        break;
      }
      case "--log-level":
        if (isLogLevel(value)) config.logLevel = value;
        consumeValue();
        break;
      case "--list":
        options.list = true;
        break;
      case "--help":
      case "-h":
        options.help = true;
        break;
      case "--version":
      case "-v":
        options.version = true;
        break;
    }
  }

  return options;
}
