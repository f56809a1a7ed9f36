import { uriEncode } from "../utils/encode";

export interface EndpointInput {
  endpoint: URL;
  /** Endpoint host is a custom domain bound to the bucket. */
  cname: boolean;
  bucket?: string;
  object?: string;
}

/**
 * Builds the request URL. Buckets are addressed virtual-hosted style
 * (`bucket.endpoint-host`) unless the endpoint is a custom domain, in which
 * case the host is used as is.
 *
 * @param input - Endpoint, addressing mode, bucket and object key.
 */
export function buildRequestUrl(input: EndpointInput): URL {
  const { endpoint, cname, bucket, object } = input;
  if (object !== undefined && !bucket) {
    throw new TypeError("An object key requires a bucket");
  }

  const url = new URL(endpoint.origin);
  if (bucket && !cname) {
    url.hostname = `${bucket}.${url.hostname}`;
  }
  url.pathname = object ? `/${encodeObjectKey(object)}` : "/";
  return url;
}

/**
 * Path used in the signature: `/bucket/key`, `/bucket/` for bucket-level
 * calls and `/` for service-level calls. The key is not escaped here.
 */
export function getResourcePath(bucket?: string, object?: string): string {
  if (!bucket) return "/";
  return `/${bucket}/${object ?? ""}`;
}

/**
 * Percent-encodes an object key for the URL path, keeping `/` separators.
 *
 * @param key - Raw key as provided by callers.
 */
export function encodeObjectKey(key: string): string {
  return uriEncode(key, true);
}
