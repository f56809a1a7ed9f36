import type { ContentTypeResolver } from "../types";
import { lookup } from "../utils/mime";

export const DEFAULT_CONTENT_TYPE = "application/octet-stream";

/**
 * Default resolver: infers the type from the key's extension.
 *
 * @param key - Object key whose extension drives detection.
 */
export const defaultContentTypeResolver: ContentTypeResolver = (key) =>
  lookupExtension(key);

/**
 * Resolves the `Content-Type` for a request, falling back to
 * {@link DEFAULT_CONTENT_TYPE}.
 *
 * @param key - Object key, absent for bucket or service calls.
 * @param explicit - Caller supplied content type.
 * @param resolver - Custom resolver to use instead of the default.
 */
export function resolveContentType(
  key: string | undefined,
  explicit: string | undefined,
  resolver: ContentTypeResolver = defaultContentTypeResolver,
): string {
  if (explicit?.trim()) {
    return explicit;
  }
  return (key ? resolver(key) : undefined) ?? DEFAULT_CONTENT_TYPE;
}

// #region Internal

function lookupExtension(key: string): string | undefined {
  const name = key.slice(key.lastIndexOf("/") + 1);
  const lastDot = name.lastIndexOf(".");
  if (lastDot <= 0) {
    return undefined;
  }
  return lookup(name.slice(lastDot + 1));
}
