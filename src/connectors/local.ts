import { spawn } from "child_process";
import type { Connector, ExecOptions, ExecResult } from "./index.js";
import { OutputBuffer } from "./output.js";

// Only pass what udevadm and cat need
const ALLOWED_ENV_VARS = ["PATH", "LANG", "LC_ALL", "TZ"];

export class LocalConnector implements Connector {
  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const timeout = options.timeout || 60000;
    const [cmd, ...args] = command;

    const filteredEnv: NodeJS.ProcessEnv = {};
    for (const key of ALLOWED_ENV_VARS) {
      if (process.env[key]) {
        filteredEnv[key] = process.env[key];
      }
    }

    return new Promise((resolve, reject) => {
      let timedOut = false;
      const stdout = new OutputBuffer();
      const stderr = new OutputBuffer();

      const proc = spawn(cmd, args, {
        env: filteredEnv,
        stdio: ["ignore", "pipe", "pipe"],
      });

      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGKILL");
        reject(new Error(`Command timed out after ${timeout / 1000} seconds`));
      }, timeout);

      proc.stdout.on("data", (data: Buffer) => stdout.push(data));
      proc.stderr.on("data", (data: Buffer) => stderr.push(data));

      proc.on("error", (err) => {
        clearTimeout(timer);
        reject(err);
      });

      proc.on("close", (code) => {
        if (timedOut) return;
        clearTimeout(timer);

        // Leading whitespace is significant in pci.ids, so only the tail is trimmed
        resolve({
          stdout: stdout.toString().trimEnd(),
          stderr: stderr.toString().trim(),
          exitCode: code ?? 0,
          ...(stdout.truncated || stderr.truncated ? { truncated: true } : {}),
        });
      });
    });
  }

  async disconnect(): Promise<void> {
    // No persistent connection for local mode
  }
}
