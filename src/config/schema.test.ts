import { describe, it, expect } from "vitest";
import { resolveConfig, validateConfig } from "./schema.js";

describe("resolveConfig", () => {
  it("fills defaults", () => {
    expect(resolveConfig()).toEqual({
      loopStyle: "meta",
      overwrite: true,
      extension: ".mid",
      initialCapacityFactor: 2,
      maxAttempts: 4,
    });
  });

  it("keeps given values", () => {
    const config = resolveConfig({ loopStyle: "controller", outDir: "out", overwrite: false });
    expect(config.loopStyle).toBe("controller");
    expect(config.outDir).toBe("out");
    expect(config.overwrite).toBe(false);
  });
});

describe("validateConfig", () => {
  it("accepts an empty object", () => {
    expect(validateConfig({})).toEqual([]);
  });

  it("reports a bad loop style by field", () => {
    const errors = validateConfig({ loopStyle: "cc" });
    expect(errors).toHaveLength(1);
    expect(errors[0].field).toBe("loopStyle");
  });

  it("rejects an extension without a dot", () => {
    expect(validateConfig({ extension: "mid" })).toEqual([
      { field: "extension", message: 'extension must look like ".mid"' },
    ]);
  });

  it("bounds the retry settings", () => {
    const fields = validateConfig({ initialCapacityFactor: 0, maxAttempts: 9 }).map(e => e.field);
    expect(fields).toEqual(["initialCapacityFactor", "maxAttempts"]);
  });

  it("reports a non-object as root", () => {
    expect(validateConfig("meta")[0].field).toBe("root");
  });
});
