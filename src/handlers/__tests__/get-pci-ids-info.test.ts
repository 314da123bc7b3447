import { describe, it, expect, vi } from "vitest";
import { handleGetPciIdsInfo } from "../get-pci-ids-info.js";
import { createMockDeps, fail, ok, parseEnvelope } from "./helpers.js";
import { SAMPLE_PCI_IDS } from "../../__tests__/fixtures.js";

describe("handleGetPciIdsInfo", () => {
  it("reports database statistics", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const env = parseEnvelope(await handleGetPciIdsInfo(deps, {}));

    expect(env.success).toBe(true);
    expect(env.data).toEqual({
      pci_ids_path: "/usr/share/misc/pci.ids",
      vendors: 2,
      models: 3,
      subsystems: 3,
    });
  });

  it("returns PCI_IDS_UNAVAILABLE for a missing file", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(fail("No such file or directory"));

    const result = await handleGetPciIdsInfo(deps, { pci_ids_path: "/nope" });
    const env = parseEnvelope(result);

    expect(result.isError).toBe(true);
    expect(env.error_code).toBe("PCI_IDS_UNAVAILABLE");
    expect(env.error).toBe("Failed to read /nope: No such file or directory");
  });

  it("maps connector errors", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockRejectedValue(new Error("Container 'inv' is not running"));

    const env = parseEnvelope(await handleGetPciIdsInfo(deps, {}));

    expect(env.success).toBe(false);
    expect(env.error_code).toBe("PCI_IDS_UNAVAILABLE");
    expect(env.remediation).toBe("Start the container or check its status with `docker ps`");
  });
});
