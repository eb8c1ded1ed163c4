import { describe, it, expect } from "vitest";
import { readConfig, validateConfig } from "./index.js";
import { DEFAULT_MAX_UPLOAD_BYTES } from "./server.js";

describe("readConfig", () => {
  it("applies defaults for unset variables", () => {
    expect(readConfig({})).toEqual({
      port: 8080,
      host: "0.0.0.0",
      maxUploadBytes: DEFAULT_MAX_UPLOAD_BYTES,
      logLevel: "info",
    });
  });

  it("reads values from the environment", () => {
    const config = readConfig({ PORT: "3000", HOST: "127.0.0.1", MAX_UPLOAD_BYTES: "1024", LOG_LEVEL: "DEBUG" });

    expect(config).toEqual({ port: 3000, host: "127.0.0.1", maxUploadBytes: 1024, logLevel: "debug" });
  });
});

describe("validateConfig", () => {
  it("returns empty array for the defaults", () => {
    expect(validateConfig(readConfig({}))).toEqual([]);
  });

  it("returns error when PORT is not a valid port", () => {
    const errors = validateConfig(readConfig({ PORT: "http" }));

    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("PORT");
  });

  it("returns error when MAX_UPLOAD_BYTES is not positive", () => {
    const errors = validateConfig(readConfig({ MAX_UPLOAD_BYTES: "0" }));

    expect(errors.some((e) => e.includes("MAX_UPLOAD_BYTES"))).toBe(true);
  });

  it("returns multiple errors when multiple values are invalid", () => {
    const errors = validateConfig(readConfig({ PORT: "70000", MAX_UPLOAD_BYTES: "1.5", LOG_LEVEL: "loud" }));

    expect(errors).toHaveLength(3);
    expect(errors.some((e) => e.includes("PORT"))).toBe(true);
    expect(errors.some((e) => e.includes("MAX_UPLOAD_BYTES"))).toBe(true);
    expect(errors.some((e) => e.includes("LOG_LEVEL"))).toBe(true);
  });
});
