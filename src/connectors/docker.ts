import Docker from "dockerode";
import type { Duplex } from "stream";
import type { Connector, ExecOptions, ExecResult } from "./index.js";
import { OutputBuffer } from "./output.js";

/**
 * Split a hijacked exec stream into stdout and stderr frames.
 *
 * Each frame has an 8-byte header: [type(1)][0][0][0][size(4 bytes BE)],
 * type 1 = stdout, 2 = stderr. Payloads are passed on as raw bytes, since a
 * frame may end inside a UTF-8 sequence. Returns the bytes of an incomplete
 * trailing frame.
 */
export function demuxDockerStream(
  buffer: Buffer,
  onFrame: (streamType: number, payload: Buffer) => void,
): Buffer {
  let rest = buffer;
  while (rest.length >= 8) {
    const payloadSize = rest.readUInt32BE(4);
    if (rest.length < 8 + payloadSize) break;
    onFrame(rest[0], rest.subarray(8, 8 + payloadSize));
    rest = rest.subarray(8 + payloadSize);
  }
  return rest;
}

export class DockerConnector implements Connector {
  private docker: Docker;
  private containerName: string;

  constructor(containerName: string) {
    // Docker container names can only contain [a-zA-Z0-9][a-zA-Z0-9_.-]*
    if (!/^[a-zA-Z0-9][a-zA-Z0-9_.-]*$/.test(containerName)) {
      throw new Error(`Invalid container name: ${containerName}`);
    }
    this.docker = new Docker();
    this.containerName = containerName;
  }

  async execute(command: string[], options: ExecOptions = {}): Promise<ExecResult> {
    if (command.length === 0) {
      throw new Error("Command array cannot be empty");
    }

    const container = this.docker.getContainer(this.containerName);

    const info = await container.inspect();
    if (!info.State.Running) {
      throw new Error(`Container '${this.containerName}' is not running`);
    }

    const exec = await container.exec({
      Cmd: command,
      AttachStdout: true,
      AttachStderr: true,
    });

    return new Promise((resolve, reject) => {
      const timeout = options.timeout || 60000;
      let timedOut = false;
      let activeStream: Duplex | null = null;

      const timer = setTimeout(() => {
        timedOut = true;
        activeStream?.destroy();
        reject(new Error(`Command timed out after ${timeout / 1000} seconds`));
      }, timeout);

      exec.start({ hijack: true, stdin: false }, (err, stream) => {
        if (err) {
          clearTimeout(timer);
          return reject(err);
        }

        if (!stream) {
          clearTimeout(timer);
          return reject(new Error("No stream returned from exec"));
        }

        activeStream = stream;

        const stdout = new OutputBuffer();
        const stderr = new OutputBuffer();
        let pending: Buffer = Buffer.alloc(0);

        const onFrame = (streamType: number, payload: Buffer) => {
          if (streamType === 1) stdout.push(payload);
          else if (streamType === 2) stderr.push(payload);
        };

        stream.on("data", (chunk: Buffer) => {
          pending = demuxDockerStream(Buffer.concat([pending, chunk]), onFrame);
        });

        stream.on("end", () => {
          if (timedOut) return;
          clearTimeout(timer);

          // No frame headers at all: the stream was raw (TTY attached)
          if (stdout.length === 0 && stderr.length === 0 && pending.length > 0) {
            stdout.push(pending);
          }

          const output = {
            stdout: stdout.toString().trimEnd(),
            stderr: stderr.toString().trim(),
            ...(stdout.truncated || stderr.truncated ? { truncated: true } : {}),
          };

          exec.inspect()
            .then((inspectResult) => {
              resolve({ ...output, exitCode: inspectResult.ExitCode ?? 0 });
            })
            .catch(() => {
              resolve({ ...output, exitCode: -1 });
            });
        });

        stream.on("error", (streamErr: Error) => {
          clearTimeout(timer);
          reject(streamErr);
        });
      });
    });
  }

  async disconnect(): Promise<void> {
    // Docker client doesn't maintain persistent connections
  }
}
