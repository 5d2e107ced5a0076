import { describe, it, expect } from "vitest";

describe("smoke test", () => {
  it("types module exports the pair file names", async () => {
    const types = await import("../src/types.js");
    expect(types.PRIMARY_FILE_NAME).toBe("CLAUDE.md");
    expect(types.SECONDARY_FILE_NAME).toBe("AGENTS.md");
  });

  it("index exports all public API modules", async () => {
    const index = await import("../src/index.js");

    // Reconciler and discovery
    expect(typeof index.syncFromTrigger).toBe("function");
    expect(typeof index.checkPairs).toBe("function");
    expect(typeof index.discoverPairs).toBe("function");
    expect(typeof index.findPairInDirectory).toBe("function");

    // Content and file helpers
    expect(typeof index.normalizeContent).toBe("function");
    expect(typeof index.writeFileAtomic).toBe("function");

    // Logging and config
    expect(typeof index.createFileLogger).toBe("function");
    expect(typeof index.loadConfig).toBe("function");
  });
});
