import type {
  ContentTypeResolver,
  HttpOptions,
  Methods,
  PreparedRequest,
  RequestBodySource,
  ResolvedConfig,
  ResourceDescriptor,
  Verb,
} from "../types";
import { toBytes } from "../utils/encode";
import { isStreamPayload } from "../utils/is";
import { resolveContentType } from "./content-type";
import { buildRequestUrl, getResourcePath } from "./endpoint";
import { buildQueryString, createHeaders } from "./serializer";
import { getContentMd5 } from "./signer";

export const SECURITY_TOKEN_HEADER = "x-oss-security-token";

const VERBS: ReadonlySet<string> = new Set<Verb>([
  "GET",
  "PUT",
  "POST",
  "DELETE",
  "HEAD",
  "OPTIONS",
]);

export interface BuildRequestInput {
  method: Methods;
  resource?: ResourceDescriptor;
  options?: HttpOptions;
  config: ResolvedConfig;
  contentTypeResolver?: ContentTypeResolver;
  /** Value of the `date` header; defaults to now. */
  date?: Date;
}

/**
 * Assembles the URL, headers and body of one call. Caller headers are kept
 * except `date` and `user-agent`, which are always set here. Nothing is
 * signed and no I/O happens.
 *
 * In-memory bodies get `content-md5`; streaming bodies get
 * `transfer-encoding: chunked` instead.
 *
 * @param input - Verb, resource, HTTP options and client configuration.
 */
export function buildRequest(input: BuildRequestInput): PreparedRequest {
  const method = normalizeVerb(input.method);
  const { bucket, object, subResources = {} } = input.resource ?? {};
  const options = input.options ?? {};
  const { config } = input;

  const url = buildRequestUrl({
    endpoint: config.endpoint,
    cname: config.cname,
    bucket,
    object,
  });
  const search = buildQueryString(subResources, options.query);
  if (search) {
    url.search = `?${search}`;
  }

  const headers = createHeaders(options.headers);
  headers.set("user-agent", config.userAgent);
  headers.set("date", (input.date ?? new Date()).toUTCString());
  headers.set(
    "content-type",
    resolveContentType(
      object,
      headers.get("content-type") ?? undefined,
      input.contentTypeResolver,
    ),
  );
  if (config.securityToken) {
    headers.set(SECURITY_TOKEN_HEADER, config.securityToken);
  }

  const body = prepareBody(options.body);
  if (isStreamPayload(body)) {
    headers.delete("content-md5");
    headers.delete("content-length");
    headers.set("transfer-encoding", "chunked");
  } else if (body) {
    headers.delete("transfer-encoding");
    headers.set("content-md5", getContentMd5(body));
  }

  return {
    method,
    url,
    headers,
    body,
    resourcePath: getResourcePath(bucket, object),
    subResources,
  };
}

/**
 * Upper-cases and validates an HTTP verb.
 */
export function normalizeVerb(method: string): Verb {
  const upper = method.toUpperCase();
  if (!isVerb(upper)) {
    throw new TypeError(`Unsupported HTTP verb: ${method}`);
  }
  return upper;
}

// #region Internal

function isVerb(value: string): value is Verb {
  return VERBS.has(value);
}

function prepareBody(
  body: HttpOptions["body"],
): RequestBodySource | undefined {
  if (body === undefined) return undefined;
  if (isStreamPayload(body)) return body;
  return toBytes(body);
}
