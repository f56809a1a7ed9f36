import type { Query, SubResources } from "../types";
import { uriEncode } from "../utils/encode";
import {
  formatPair,
  serializeSubResources,
  type SubResourcePair,
} from "./canonical";

/**
 * Copies caller headers into a fresh {@link Headers} so the request builder
 * never mutates the caller's object.
 *
 * @param init - Headers supplied in the request options.
 */
export function createHeaders(init?: HeadersInit): Headers {
  return new Headers(init);
}

/**
 * Renders sub-resources followed by query options as a query string (without
 * the leading `?`). A query option overrides a sub-resource of the same name;
 * bare sub-resources stay bare (`acl`, not `acl=`).
 *
 * @param subResources - Signed sub-resources, kept in insertion order.
 * @param query - Plain query parameters; arrays repeat the key.
 */
export function buildQueryString(
  subResources: SubResources | undefined,
  query: Query | undefined,
): string {
  const queryPairs = serializeQuery(query);
  const overridden = new Set(queryPairs.map((pair) => pair.key));
  const pairs = serializeSubResources(subResources, (value) =>
    uriEncode(value),
  ).filter((pair) => !overridden.has(pair.key));
  return [...pairs, ...queryPairs].map(formatPair).join("&");
}

// #region Internal

function serializeQuery(query: Query | undefined): SubResourcePair[] {
  const pairs: SubResourcePair[] = [];
  if (!query) return pairs;
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined) continue;
    const values = Array.isArray(value) ? value : [value];
    for (const item of values) {
      if (item === undefined) continue;
      pairs.push({
        key: uriEncode(key),
        value: uriEncode(normalizeQueryValue(item)),
      });
    }
  }
  return pairs;
}

function normalizeQueryValue(value: string | number | boolean): string {
  if (typeof value === "string") return value;
  if (typeof value === "number")
    return Number.isFinite(value) ? value.toString() : "";
  return value ? "true" : "false";
}
