/**
 * Unit tests for LocalConnector. These run real local processes, with no
 * mocking and no MCP layer, and work on any dev machine.
 */

import { describe, it, expect } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LocalConnector } from "../connectors/local.js";
import { MAX_OUTPUT_SIZE } from "../connectors/output.js";
import { loadPciDatabase } from "../pciids/loader.js";

describe("LocalConnector", () => {
  const connector = new LocalConnector();

  it("execute() runs a command and returns stdout", async () => {
    const result = await connector.execute(["echo", "hello"]);
    expect(result.stdout).toBe("hello");
    expect(result.exitCode).toBe(0);
    expect(result.truncated).toBeUndefined();
  });

  it("execute() keeps leading whitespace", async () => {
    const result = await connector.execute(["printf", "\t0020  Model Y\n"]);
    expect(result.stdout).toBe("\t0020  Model Y");
  });

  it("execute() returns non-zero exit code on failure", async () => {
    const result = await connector.execute(["false"]);
    expect(result.exitCode).not.toBe(0);
  });

  it("execute() throws on empty command array", async () => {
    await expect(connector.execute([])).rejects.toThrow(
      "Command array cannot be empty",
    );
  });

  it("disconnect() is a no-op and does not throw", async () => {
    await expect(connector.disconnect()).resolves.toBeUndefined();
  });

  it("times out long-running commands", async () => {
    await expect(
      connector.execute(["sleep", "10"], { timeout: 500 }),
    ).rejects.toThrow("Command timed out after 0.5 seconds");
  });

  it("filters environment variables to allowed list", async () => {
    process.env.INVENTORY_TEST_TOKEN = "test-secret";

    try {
      const result = await connector.execute(["env"]);
      expect(result.stdout).not.toContain("INVENTORY_TEST_TOKEN");
      expect(result.stdout).toContain("PATH=");
    } finally {
      delete process.env.INVENTORY_TEST_TOKEN;
    }
  });

  it("flags output past the size limit", async () => {
    const result = await connector.execute(["head", "-c", String(MAX_OUTPUT_SIZE + 4096), "/dev/zero"]);
    expect(result.truncated).toBe(true);
    expect(result.stdout.length).toBe(MAX_OUTPUT_SIZE);
  }, 15_000);

  it("reads a pci.ids full of multi-byte names without mangling them", async () => {
    const dir = mkdtempSync(join(tmpdir(), "pci-inventory-"));
    const path = join(dir, "pci.ids");
    const count = 5000;
    const name = (i: number) => `${"ö".repeat(101)}${i}`;
    const lines: string[] = [];
    for (let i = 0; i < count; i++) {
      lines.push(`${i.toString(16).padStart(4, "0")}  ${name(i)}`);
    }

    try {
      writeFileSync(path, lines.join("\n") + "\n", "utf8");

      const db = await loadPciDatabase(connector, path);

      expect(db.stats().vendors).toBe(count);
      const wrong: string[] = [];
      for (let i = 0; i < count; i++) {
        const id = i.toString(16).padStart(4, "0");
        if (db.vendorName(id) !== name(i)) wrong.push(id);
      }
      expect(wrong).toEqual([]);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  }, 15_000);
});
