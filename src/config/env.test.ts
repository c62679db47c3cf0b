import { describe, expect, it } from "vitest";
import { readConfig } from "./env";

describe("readConfig", () => {
  it("applies defaults", () => {
    expect(readConfig({})).toEqual({ port: 3000, categoryCatalogPath: undefined, uploadRowLimit: 2000 });
  });

  it("reads overrides from the environment", () => {
    expect(
      readConfig({ PORT: "8080", CATEGORY_CATALOG_PATH: " ./catalog.json ", UPLOAD_ROW_LIMIT: "50" }),
    ).toEqual({ port: 8080, categoryCatalogPath: "./catalog.json", uploadRowLimit: 50 });
  });

  it("rejects invalid values", () => {
    expect(() => readConfig({ PORT: "not-a-port" })).toThrow(/PORT/);
  });
});
