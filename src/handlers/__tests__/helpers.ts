import { vi } from "vitest";
import type { HandlerDeps } from "../types.js";
import { silentLogger } from "../../utils/logger.js";
import {
  BRIDGE_PROPERTIES,
  BRIDGE_SYSPATH,
  NIC_PROPERTIES,
  NIC_SYSPATH,
  SAMPLE_PCI_IDS,
} from "../../__tests__/fixtures.js";

export function createMockDeps(overrides?: Partial<HandlerDeps["config"]>): HandlerDeps {
  return {
    connector: {
      execute: vi.fn(),
      disconnect: vi.fn(),
    },
    config: {
      pciIdsPath: "/usr/share/misc/pci.ids",
      timeout: 60,
      mode: "docker" as const,
      ...overrides,
    },
    logger: silentLogger,
  };
}

export function ok(stdout: string, exitCode = 0) {
  return { stdout, stderr: "", exitCode };
}

export function fail(stderr: string, exitCode = 1) {
  return { stdout: "", stderr, exitCode };
}

/** Answers cat and udevadm like a host with two PCI devices. */
export async function fakeHost(command: string[]) {
  const [cmd, sub] = command;
  if (cmd === "cat") return ok(SAMPLE_PCI_IDS);
  if (cmd === "udevadm" && sub === "trigger") return ok(`${BRIDGE_SYSPATH}\n${NIC_SYSPATH}\n`);
  if (cmd === "udevadm" && sub === "info") {
    const path = command[3];
    if (path === `--path=${BRIDGE_SYSPATH}`) return ok(BRIDGE_PROPERTIES);
    if (path === `--path=${NIC_SYSPATH}`) return ok(NIC_PROPERTIES);
  }
  return fail(`unexpected command: ${command.join(" ")}`);
}

export function parseEnvelope(result: { content: Array<{ type: string; text: string }> }) {
  return JSON.parse(result.content[0].text);
}
