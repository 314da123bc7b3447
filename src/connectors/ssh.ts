import { Client } from "ssh2";
import type { Connector, ExecOptions, ExecResult } from "./index.js";
import { OutputBuffer } from "./output.js";

export interface SSHConfig {
  host: string;
  user: string;
  port: number;
  password?: string;
}

/** Single-quote an argument for the remote shell. */
export function shellQuote(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

export class SSHConnector implements Connector {
  private config: SSHConfig;
  private client: Client | null = null;

  constructor(config: SSHConfig) {
    this.config = config;
  }

  private async connect(): Promise<Client> {
    if (this.client) {
      return this.client;
    }

    return new Promise((resolve, reject) => {
      const client = new Client();

      client.on("ready", () => {
        this.client = client;
        resolve(client);
      });

      client.on("error", (err) => {
        this.client = null;
        reject(err);
      });

      client.on("close", () => {
        this.client = null;
      });

      const connectConfig: Parameters<Client["connect"]>[0] = {
        host: this.config.host,
        port: this.config.port,
        username: this.config.user,
      };

      if (this.config.password) {
        connectConfig.password = this.config.password;
      } else {
        connectConfig.agent = process.env.SSH_AUTH_SOCK;
      }

      client.connect(connectConfig);
    });
  }

  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const client = await this.connect();
    const timeout = options.timeout || 60000;
    const cmdString = command.map(shellQuote).join(" ");

    return new Promise((resolve, reject) => {
      let timedOut = false;

      const timer = setTimeout(() => {
        timedOut = true;
        this.client?.end();
        this.client = null;
        reject(new Error(`Command timed out after ${timeout / 1000} seconds`));
      }, timeout);

      client.exec(cmdString, (err, stream) => {
        if (err) {
          clearTimeout(timer);
          return reject(err);
        }

        const stdout = new OutputBuffer();
        const stderr = new OutputBuffer();

        stream.on("data", (data: Buffer) => stdout.push(data));
        stream.stderr.on("data", (data: Buffer) => stderr.push(data));

        stream.on("close", (code: number | null) => {
          if (timedOut) return;
          clearTimeout(timer);
          resolve({
            stdout: stdout.toString().trimEnd(),
            stderr: stderr.toString().trim(),
            exitCode: code ?? -1,
            ...(stdout.truncated || stderr.truncated ? { truncated: true } : {}),
          });
        });
      });
    });
  }

  async disconnect(): Promise<void> {
    if (this.client) {
      this.client.end();
      this.client = null;
    }
  }
}
