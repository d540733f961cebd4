import { describe, it, expect } from "vitest";
import { SnapconfConfigSchema } from "../../src/config/schema.js";

describe("SnapconfConfigSchema", () => {
  it("parses empty object", () => {
    expect(SnapconfConfigSchema.parse({})).toEqual({});
  });

  it("applies logging defaults", () => {
    const result = SnapconfConfigSchema.parse({ logging: {} });
    expect(result.logging).toEqual({ verbose: false, json: false });
  });

  it("accepts a full config", () => {
    const result = SnapconfConfigSchema.parse({
      storage: { dir: "/srv/backups" },
      retention: { keep: 5, olderThanDays: 30 },
      logging: { verbose: true, json: true, file: "/var/log/snapconf.log" },
    });
    expect(result.storage?.dir).toBe("/srv/backups");
    expect(result.retention).toEqual({ keep: 5, olderThanDays: 30 });
    expect(result.logging?.file).toBe("/var/log/snapconf.log");
  });

  it("rejects non-positive retention values", () => {
    expect(SnapconfConfigSchema.safeParse({ retention: { keep: 0 } }).success).toBe(false);
    expect(SnapconfConfigSchema.safeParse({ retention: { olderThanDays: -1 } }).success).toBe(false);
  });

  it("rejects fractional retention values", () => {
    expect(SnapconfConfigSchema.safeParse({ retention: { keep: 2.5 } }).success).toBe(false);
  });
});
