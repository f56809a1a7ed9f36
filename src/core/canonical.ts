import type { SubResources } from "../types";

/** Prefix of vendor headers that take part in the signature. */
export const OSS_HEADER_PREFIX = "x-oss-";

export interface CanonicalInput {
  method: string;
  headers: Headers;
  /** Resource path, `/bucket/key`, `/bucket/` or `/`. */
  resourcePath?: string;
  subResources?: SubResources;
}

/**
 * Builds the string the server recomputes to verify a request signature:
 *
 * ```
 * VERB\nContent-MD5\nContent-Type\nDate\n[x-oss-name:value\n...]/bucket/key[?sub-resources]
 * ```
 *
 * Missing `content-md5` and `content-type` contribute empty lines. Output
 * depends only on the arguments.
 *
 * @param input - Verb, headers and resource of the request.
 */
export function buildCanonicalString(input: CanonicalInput): string {
  const { headers } = input;
  return [
    input.method.toUpperCase(),
    headers.get("content-md5") ?? "",
    headers.get("content-type") ?? "",
    headers.get("date") ?? "",
    canonicalizeHeaders(headers) +
      canonicalizeResource(input.resourcePath, input.subResources),
  ].join("\n");
}

/**
 * Lists `x-oss-*` headers as `name:value\n` lines sorted by lower-cased name.
 */
export function canonicalizeHeaders(headers: Headers): string {
  const entries: Array<[string, string]> = [];
  headers.forEach((value, key) => {
    const name = key.trim().toLowerCase();
    if (name.startsWith(OSS_HEADER_PREFIX)) {
      entries.push([name, value.trim()]);
    }
  });
  entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return entries.map(([name, value]) => `${name}:${value}\n`).join("");
}

/**
 * Appends sorted sub-resources to the resource path. Keys whose value is
 * `null`, `true` or empty appear bare.
 *
 * @param resourcePath - Defaults to `/` when there is no bucket.
 * @param subResources - Sub-resources in any order.
 */
export function canonicalizeResource(
  resourcePath: string | undefined,
  subResources?: SubResources,
): string {
  const path = resourcePath || "/";
  const pairs = serializeSubResources(subResources, (value) => value).sort(
    (a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0),
  );
  if (pairs.length === 0) {
    return path;
  }
  return `${path}?${pairs.map(formatPair).join("&")}`;
}

export interface SubResourcePair {
  key: string;
  value?: string;
}

/**
 * Normalizes sub-resource values, dropping `false`/`undefined` and keeping
 * insertion order.
 *
 * @param escape - Applied to keys and values (identity for signing, URI
 *   encoding for the query string).
 */
export function serializeSubResources(
  subResources: SubResources | undefined,
  escape: (value: string) => string,
): SubResourcePair[] {
  const pairs: SubResourcePair[] = [];
  if (!subResources) return pairs;
  for (const [key, raw] of Object.entries(subResources)) {
    if (raw === undefined || raw === false) continue;
    if (raw === null || raw === true || raw === "") {
      pairs.push({ key: escape(key) });
      continue;
    }
    pairs.push({ key: escape(key), value: escape(String(raw)) });
  }
  return pairs;
}

export function formatPair(pair: SubResourcePair): string {
  return pair.value === undefined ? pair.key : `${pair.key}=${pair.value}`;
}
