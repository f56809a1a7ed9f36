import { describe, expect, it } from "vitest";

import {
  DEFAULT_OPEN_TIMEOUT_MS,
  DEFAULT_READ_TIMEOUT_MS,
  loadConfig,
  resolveConfig,
} from "../../src/core/config";

describe("resolveConfig", () => {
  it("fills in defaults", () => {
    const config = resolveConfig({ endpoint: "https://oss.example.com" });

    expect(config.endpoint.host).toBe("oss.example.com");
    expect(config.cname).toBe(false);
    expect(config.openTimeout).toBe(DEFAULT_OPEN_TIMEOUT_MS);
    expect(config.readTimeout).toBe(DEFAULT_READ_TIMEOUT_MS);
    expect(config.accessKeyId).toBeUndefined();
    expect(config.userAgent).toMatch(/^osswire\/\d+\.\d+\.\d+ node\/v\d+/);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("keeps overrides", () => {
    const config = resolveConfig({
      endpoint: "http://127.0.0.1:9000",
      cname: true,
      accessKeyId: "test-id",
      accessKeySecret: "test-secret",
      openTimeout: 1_000,
      readTimeout: 2_000,
      userAgent: "custom/1.0",
    });

    expect(config).toMatchObject({
      cname: true,
      accessKeyId: "test-id",
      accessKeySecret: "test-secret",
      openTimeout: 1_000,
      readTimeout: 2_000,
      userAgent: "custom/1.0",
    });
  });

  it("treats blank credentials as missing", () => {
    const config = resolveConfig({
      endpoint: "https://oss.example.com",
      accessKeyId: "  ",
      accessKeySecret: "",
    });

    expect(config.accessKeyId).toBeUndefined();
    expect(config.accessKeySecret).toBeUndefined();
  });

  it("rejects invalid endpoints and timeouts", () => {
    expect(() => resolveConfig({ endpoint: "not a url" })).toThrow(
      /^Invalid configuration/,
    );
    expect(() => resolveConfig({ endpoint: "ftp://oss.example.com" })).toThrow(
      /endpoint must use http or https/,
    );
    expect(() =>
      resolveConfig({ endpoint: "https://oss.example.com", readTimeout: 0 }),
    ).toThrow(/^Invalid configuration/);
  });
});

describe("loadConfig", () => {
  it("reads OSS_* variables", () => {
    const config = loadConfig({
      OSS_ENDPOINT: "https://oss.example.com",
      OSS_CNAME: "true",
      OSS_ACCESS_KEY_ID: "test-id",
      OSS_ACCESS_KEY_SECRET: "test-secret",
      OSS_READ_TIMEOUT_MS: "5000",
    });

    expect(config).toEqual({
      endpoint: "https://oss.example.com",
      cname: true,
      accessKeyId: "test-id",
      accessKeySecret: "test-secret",
      securityToken: undefined,
      openTimeout: undefined,
      readTimeout: 5000,
    });
    expect(resolveConfig(config).openTimeout).toBe(DEFAULT_OPEN_TIMEOUT_MS);
  });

  it("requires an endpoint", () => {
    expect(() => loadConfig({})).toThrow(/^Invalid configuration/);
  });
});
