import type { Logger } from "pino";
import type { Dispatcher } from "undici";

import type { StreamPayload } from "./core/stream";

export type UppercaseOrLowercase<T extends string> =
  | Uppercase<T>
  | Lowercase<T>;

export type Verb = "GET" | "PUT" | "POST" | "DELETE" | "HEAD" | "OPTIONS";
export type Methods = UppercaseOrLowercase<Verb>;

export type SubResourceValue = string | number | boolean | null | undefined;

/**
 * Sub-resources in insertion order. `null`, `true` and `""` render as a bare
 * key (`?acl`), `false` and `undefined` are dropped.
 */
export type SubResources = Record<string, SubResourceValue>;

export type QueryValue =
  | string
  | number
  | boolean
  | undefined
  | Array<string | number | boolean | undefined>;

export type Query = Record<string, QueryValue>;

export interface ResourceDescriptor {
  bucket?: string;
  object?: string;
  subResources?: SubResources;
}

export type RequestBody = string | Uint8Array | StreamPayload;

export interface HttpOptions {
  headers?: HeadersInit;
  query?: Query;
  body?: RequestBody;
  signal?: AbortSignal;
}

export type ChunkHandler = (chunk: Uint8Array) => void | Promise<void>;

/** Maps an object key to a MIME type; `undefined` falls back to the default. */
export type ContentTypeResolver = (key: string) => string | undefined;

export type FetchInit = RequestInit & {
  duplex?: "half";
  dispatcher?: Dispatcher;
};

export type Fetcher = (input: string, init: FetchInit) => Promise<Response>;

/**
 * Serializable connection settings, validated by `resolveConfig`.
 */
export interface ConnectionConfig {
  endpoint: string;
  cname?: boolean;
  accessKeyId?: string;
  accessKeySecret?: string;
  securityToken?: string;
  /** Connect timeout in milliseconds. */
  openTimeout?: number;
  /** Time allowed for response headers and between body chunks, in milliseconds. */
  readTimeout?: number;
  userAgent?: string;
}

export interface OSSClientConfig extends ConnectionConfig {
  fetch?: Fetcher;
  logger?: Logger;
  contentTypeResolver?: ContentTypeResolver;
}

export interface ResolvedConfig {
  endpoint: URL;
  cname: boolean;
  accessKeyId?: string;
  accessKeySecret?: string;
  securityToken?: string;
  openTimeout: number;
  readTimeout: number;
  userAgent: string;
}

export type RequestBodySource = Uint8Array | StreamPayload;

/**
 * Output of the request builder: everything the transport needs, already
 * signed once `authorization` is set.
 */
export interface PreparedRequest {
  method: Verb;
  url: URL;
  headers: Headers;
  body?: RequestBodySource;
  /** Resource path used for signing, e.g. `/bucket/key`. */
  resourcePath: string;
  subResources: SubResources;
}

export interface ResponseEnvelope {
  status: number;
  headers: Headers;
  requestId?: string;
  /** Buffered body, present only when no chunk handler was supplied. */
  body?: Uint8Array;
}

export type TransportPhase =
  | "idle"
  | "sending"
  | "streaming"
  | "buffering"
  | "done";
