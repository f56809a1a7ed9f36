import { describe, expect, it } from "vitest";

import {
  DEFAULT_CONTENT_TYPE,
  defaultContentTypeResolver,
  resolveContentType,
} from "../../src/core/content-type";

describe("content type resolver", () => {
  it("prefers explicit content type", () => {
    expect(resolveContentType("file.txt", "application/custom")).toBe(
      "application/custom",
    );
  });

  it("infers from the key extension", () => {
    expect(resolveContentType("photos/cat.JPG", undefined)).toBe("image/jpeg");
    expect(resolveContentType("docs/report.xlsx", undefined)).toBe(
      "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    );
    expect(resolveContentType("app.apk", undefined)).toBe(
      "application/vnd.android.package-archive",
    );
  });

  it("falls back to octet-stream", () => {
    expect(resolveContentType("obj", undefined)).toBe(DEFAULT_CONTENT_TYPE);
    expect(resolveContentType("dir.d/obj", undefined)).toBe(
      DEFAULT_CONTENT_TYPE,
    );
    expect(resolveContentType("archive.unknownext", undefined)).toBe(
      DEFAULT_CONTENT_TYPE,
    );
    expect(resolveContentType(undefined, undefined)).toBe(DEFAULT_CONTENT_TYPE);
  });

  it("can be overridden with custom resolver", () => {
    const resolver = (key: string) =>
      key.endsWith(".data") ? "application/x-data" : undefined;
    expect(resolveContentType("document.data", undefined, resolver)).toBe(
      "application/x-data",
    );
    expect(resolveContentType("document.txt", undefined, resolver)).toBe(
      DEFAULT_CONTENT_TYPE,
    );
  });

  it("ignores a blank explicit content type", () => {
    expect(resolveContentType("index.html", "  ")).toBe("text/html");
  });

  it("default resolver leaves unknown extensions to the caller", () => {
    expect(defaultContentTypeResolver("index.html")).toBe("text/html");
    expect(defaultContentTypeResolver("archive.unknownext")).toBeUndefined();
  });
});
