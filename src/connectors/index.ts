export interface ExecOptions {
  /** Milliseconds */
  timeout?: number;
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  /** Set when stdout or stderr went past MAX_OUTPUT_SIZE and was cut. */
  truncated?: boolean;
}

/** Runs commands on the system whose PCI bus is being inventoried. */
export interface Connector {
  execute(command: string[], options?: ExecOptions): Promise<ExecResult>;
  disconnect(): Promise<void>;
}

export type ConnectionMode = "docker" | "ssh" | "local";

export interface ConnectorConfig {
  mode: ConnectionMode;
  container?: string;
  host?: string;
  user?: string;
  port?: number;
  password?: string;
}

export async function createConnector(config: ConnectorConfig): Promise<Connector> {
  switch (config.mode) {
    case "docker": {
      if (!config.container) throw new Error("Docker mode requires --container");
      const { DockerConnector } = await import("./docker.js");
      return new DockerConnector(config.container);
    }

    case "ssh": {
      if (!config.host) throw new Error("SSH mode requires --host");
      const { SSHConnector } = await import("./ssh.js");
      return new SSHConnector({
        host: config.host,
        user: config.user || "root",
        port: config.port || 22,
        ...(config.password ? { password: config.password } : {}),
      });
    }

    case "local": {
      const { LocalConnector } = await import("./local.js");
      return new LocalConnector();
    }

    default:
      throw new Error(`Unknown connection mode: ${String(config.mode)}`);
  }
}
