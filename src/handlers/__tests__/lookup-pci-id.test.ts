import { describe, it, expect, vi } from "vitest";
import { handleLookupPciId } from "../lookup-pci-id.js";
import { createMockDeps, fail, ok, parseEnvelope } from "./helpers.js";
import { SAMPLE_PCI_IDS } from "../../__tests__/fixtures.js";

describe("handleLookupPciId", () => {
  it("looks up a vendor alone", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const env = parseEnvelope(await handleLookupPciId(deps, { vendor_id: "0010" }));

    expect(env.success).toBe(true);
    expect(env.data).toEqual({ vendor_id: "0010", vendor: "Vendor X" });
  });

  it("looks up a vendor and model", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const env = parseEnvelope(await handleLookupPciId(deps, { vendor_id: "0010", model_id: "0020" }));

    expect(env.data).toEqual({
      vendor_id: "0010",
      vendor: "Vendor X",
      model_id: "0020",
      model: "Model Y",
      description: "Model Y",
    });
  });

  it("merges the subsystem into the description", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const env = parseEnvelope(await handleLookupPciId(deps, {
      vendor_id: "0010",
      model_id: "0020",
      subsystem_vendor_id: "0030",
      subsystem_device_id: "0040",
    }));

    expect(env.data.description).toBe("Model Y, Sub Z");
    expect(env.data.subsystem).toBe("Sub Z");
    expect(env.data.subsystem_vendor).toBeNull();
  });

  it("keeps the plain description for an unknown subsystem", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const env = parseEnvelope(await handleLookupPciId(deps, {
      vendor_id: "1a2b",
      model_id: "3c4d",
      subsystem_vendor_id: "0010",
      subsystem_device_id: "0099",
    }));

    expect(env.success).toBe(true);
    expect(env.data.description).toBe("Acme Bridge");
    expect(env.data.subsystem).toBeNull();
    expect(env.data.subsystem_vendor).toBe("Vendor X");
  });

  it("returns VENDOR_NOT_FOUND for an unknown vendor", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const result = await handleLookupPciId(deps, { vendor_id: "beef" });
    const env = parseEnvelope(result);

    expect(result.isError).toBe(true);
    expect(env.error_code).toBe("VENDOR_NOT_FOUND");
    expect(env.error_category).toBe("not_found");
    expect(env.error).toBe("Vendor beef is not in pci.ids");
  });

  it("returns MODEL_NOT_FOUND for an unknown model", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(ok(SAMPLE_PCI_IDS));

    const env = parseEnvelope(await handleLookupPciId(deps, { vendor_id: "0010", model_id: "0021" }));

    expect(env.error_code).toBe("MODEL_NOT_FOUND");
    expect(env.error).toBe("Device 0010:0021 is not in pci.ids");
  });

  it("rejects a partial subsystem without reading pci.ids", async () => {
    const deps = createMockDeps();

    const env = parseEnvelope(await handleLookupPciId(deps, {
      vendor_id: "0010",
      model_id: "0020",
      subsystem_vendor_id: "0030",
    }));

    expect(env.error_code).toBe("INVALID_INPUT");
    expect(env.error_category).toBe("validation");
    expect(deps.connector.execute).not.toHaveBeenCalled();
  });

  it("returns PCI_IDS_UNAVAILABLE when the database cannot be read", async () => {
    const deps = createMockDeps();
    vi.mocked(deps.connector.execute).mockResolvedValue(fail("cat: /usr/share/misc/pci.ids: No such file or directory"));

    const env = parseEnvelope(await handleLookupPciId(deps, { vendor_id: "0010" }));

    expect(env.success).toBe(false);
    expect(env.error_code).toBe("PCI_IDS_UNAVAILABLE");
    expect(env.error_category).toBe("source_unavailable");
  });
});
