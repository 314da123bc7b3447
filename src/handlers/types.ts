import type { ConnectionMode, Connector } from "../connectors/index.js";
import type { Logger } from "../utils/logger.js";

export interface HandlerConfig {
  pciIdsPath: string;
  /** Seconds */
  timeout: number;
  mode: ConnectionMode;
}

export interface HandlerDeps {
  connector: Connector;
  config: HandlerConfig;
  logger: Logger;
}
