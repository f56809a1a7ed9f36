import type { Logger } from "pino";
import { Agent } from "undici";

import {
  buildRequest,
  createLogger,
  getResourcePath,
  resolveConfig,
  send,
  signRequest,
} from "./core";
import type {
  ChunkHandler,
  ContentTypeResolver,
  Fetcher,
  HttpOptions,
  Methods,
  OSSClientConfig,
  PreparedRequest,
  ResolvedConfig,
  ResourceDescriptor,
  ResponseEnvelope,
} from "./types";

/**
 * Signed HTTP access to an OSS endpoint. Each call builds its request,
 * signs it with the configured access key and performs exactly one exchange;
 * successful bodies stream to the optional chunk handler, failures surface as
 * {@link TransportError}. The client holds no per-request state and can be
 * shared.
 *
 * @example simple get
 * ```ts
 * const { body } = await client.get({ bucket: "photos" });
 * ```
 * @example streaming download
 * ```ts
 * await client.get({ bucket: "photos", object: "cat.jpg" }, {}, (chunk) => {
 *   file.write(chunk);
 * });
 * ```
 */
export class OSSClient {
  readonly config: ResolvedConfig;
  private readonly fetcher: Fetcher;
  private readonly logger: Logger;
  private readonly contentTypeResolver?: ContentTypeResolver;
  private readonly dispatcher: Agent;

  /**
   * @param config - Endpoint, credentials, timeouts and runtime overrides.
   */
  constructor(config: OSSClientConfig) {
    this.config = resolveConfig(config);
    this.fetcher = config.fetch ?? globalFetch() ?? missingFetch();
    this.logger = config.logger ?? createLogger();
    this.contentTypeResolver = config.contentTypeResolver;
    this.dispatcher = new Agent({
      connect: { timeout: this.config.openTimeout },
      headersTimeout: this.config.readTimeout,
      bodyTimeout: this.config.readTimeout,
    });
  }

  /**
   * Sends one request.
   *
   * @param method - HTTP verb.
   * @param resource - Bucket, object key and sub-resources.
   * @param options - Extra headers, query parameters and body.
   * @param onChunk - Receives the decoded body of a successful response;
   *   without it the body is buffered into the returned envelope.
   */
  async execute(
    method: Methods,
    resource: ResourceDescriptor = {},
    options: HttpOptions = {},
    onChunk?: ChunkHandler,
  ): Promise<ResponseEnvelope> {
    let request: PreparedRequest;
    try {
      request = buildRequest({
        method,
        resource,
        options,
        config: this.config,
        contentTypeResolver: this.contentTypeResolver,
      });
    } catch (error) {
      this.logger.error(
        {
          method,
          resource: getResourcePath(resource.bucket, resource.object),
          err: error,
        },
        "Invalid request",
      );
      throw error;
    }

    const signing = signRequest({
      method: request.method,
      headers: request.headers,
      resourcePath: request.resourcePath,
      subResources: request.subResources,
      credentials: this.config,
    });
    if (!signing.signed) {
      this.logger.debug(
        { method: request.method, resource: request.resourcePath },
        "No access key configured, sending request unauthenticated",
      );
    }

    return await send(request, {
      fetch: this.fetcher,
      logger: this.logger,
      dispatcher: this.dispatcher,
      onChunk,
      signal: options.signal,
    });
  }

  async get(
    resource?: ResourceDescriptor,
    options?: HttpOptions,
    onChunk?: ChunkHandler,
  ): Promise<ResponseEnvelope> {
    return await this.execute("GET", resource, options, onChunk);
  }

  async put(
    resource?: ResourceDescriptor,
    options?: HttpOptions,
    onChunk?: ChunkHandler,
  ): Promise<ResponseEnvelope> {
    return await this.execute("PUT", resource, options, onChunk);
  }

  async post(
    resource?: ResourceDescriptor,
    options?: HttpOptions,
    onChunk?: ChunkHandler,
  ): Promise<ResponseEnvelope> {
    return await this.execute("POST", resource, options, onChunk);
  }

  async del(
    resource?: ResourceDescriptor,
    options?: HttpOptions,
    onChunk?: ChunkHandler,
  ): Promise<ResponseEnvelope> {
    return await this.execute("DELETE", resource, options, onChunk);
  }

  async head(
    resource?: ResourceDescriptor,
    options?: HttpOptions,
  ): Promise<ResponseEnvelope> {
    return await this.execute("HEAD", resource, options);
  }

  async options(
    resource?: ResourceDescriptor,
    options?: HttpOptions,
  ): Promise<ResponseEnvelope> {
    return await this.execute("OPTIONS", resource, options);
  }

  /**
   * Closes pooled connections. Calls made afterwards fail.
   */
  async close(): Promise<void> {
    await this.dispatcher.close();
  }
}

// #region Internal

function globalFetch(): Fetcher | undefined {
  if (typeof fetch === "function") {
    return fetch.bind(globalThis);
  }
  return undefined;
}

function missingFetch(): never {
  throw new Error(
    "fetch is not available in this environment; provide a fetch implementation in OSSClientConfig.fetch",
  );
}
