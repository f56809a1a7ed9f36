import type { Logger } from "pino";
import type { Dispatcher } from "undici";

import type {
  ChunkHandler,
  Fetcher,
  FetchInit,
  PreparedRequest,
  ResponseEnvelope,
  TransportPhase,
} from "../types";
import { toText } from "../utils/encode";
import { isStreamPayload } from "../utils/is";
import { canonicalizeResource } from "./canonical";
import { REQUEST_ID_HEADER, mapErrorResponse } from "./error-mapper";
import { headersToObject } from "./logger";
import type { StreamWriter } from "./stream";

/**
 * Headers that describe message framing. They are part of the signature but
 * fetch computes the framing itself and refuses them on outgoing requests.
 */
const FRAMING_HEADERS = ["transfer-encoding", "content-length", "connection"];

export interface TransportContext {
  fetch: Fetcher;
  logger: Logger;
  /** Carries connect/read timeouts when the fetch implementation honors it. */
  dispatcher?: Dispatcher;
  /** Receives decoded body chunks of a successful response. */
  onChunk?: ChunkHandler;
  signal?: AbortSignal;
  /** Bytes pulled from a streaming body per read. */
  chunkSize?: number;
}

/**
 * Performs one HTTP exchange.
 *
 * The status line alone picks the body path: below 300 the body is handed to
 * `onChunk` chunk by chunk as it arrives (or buffered into the envelope when
 * there is no handler); from 300 upwards it is read completely and raised as
 * a {@link TransportError}. Redirects are returned, not followed. Network
 * failures are logged and rethrown unchanged.
 *
 * @param request - Signed request from the builder.
 * @param context - Fetch implementation, logger and body callback.
 */
export async function send(
  request: PreparedRequest,
  context: TransportContext,
): Promise<ResponseEnvelope> {
  const { logger } = context;
  const resource = canonicalizeResource(
    request.resourcePath,
    request.subResources,
  );
  const log = { method: request.method, resource };
  let phase: TransportPhase = "idle";

  let session: StreamWriter | undefined;
  try {
    session = isStreamPayload(request.body) ? request.body.open() : undefined;
  } catch (error) {
    logger.error({ ...log, phase, err: error }, "Request body unavailable");
    throw error;
  }
  const init = createInit(request, context, session);

  phase = "sending";
  logger.debug(
    {
      ...log,
      url: request.url.toString(),
      headers: headersToObject(request.headers),
    },
    "Sending HTTP request",
  );

  let response: Response;
  try {
    response = await context.fetch(request.url.toString(), init);
  } catch (error) {
    session?.discard();
    const failure = session?.failure() ?? error;
    logger.error({ ...log, phase, err: failure }, "HTTP request failed");
    throw failure;
  }

  const { status, headers } = response;
  const requestId = headers.get(REQUEST_ID_HEADER) ?? undefined;

  if (status >= 300) {
    phase = "buffering";
    session?.discard();
    const body = await bufferErrorBody(response, logger);
    const error = mapErrorResponse({
      status,
      statusText: response.statusText,
      headers,
      body,
      method: request.method,
      resource,
    });
    logger.error(
      {
        ...log,
        phase,
        status,
        requestId: error.requestId,
        code: error.code,
      },
      error.message,
    );
    throw error;
  }

  phase = "streaming";
  try {
    const envelope: ResponseEnvelope = { status, headers, requestId };
    if (context.onChunk) {
      const received = await deliverChunks(response.body, context.onChunk);
      logger.debug(
        { ...log, status, requestId, bytes: received },
        "Received HTTP response",
      );
    } else {
      envelope.body = new Uint8Array(await response.arrayBuffer());
      logger.debug(
        { ...log, status, requestId, bytes: envelope.body.byteLength },
        "Received HTTP response",
      );
    }
    phase = "done";
    return envelope;
  } catch (error) {
    logger.error(
      { ...log, phase, status, requestId, err: error },
      "HTTP response body failed",
    );
    throw error;
  }
}

// #region Internal

function createInit(
  request: PreparedRequest,
  context: TransportContext,
  session: StreamWriter | undefined,
): FetchInit {
  const headers = new Headers(request.headers);
  for (const name of FRAMING_HEADERS) {
    headers.delete(name);
  }

  const init: FetchInit = {
    method: request.method,
    headers,
    redirect: "manual",
    signal: context.signal,
    dispatcher: context.dispatcher,
  };

  if (session) {
    init.body = session.toReadableStream(context.chunkSize);
    init.duplex = "half";
  } else if (request.body && !isStreamPayload(request.body)) {
    init.body = new Uint8Array(request.body);
  }

  return init;
}

/**
 * Hands body chunks to the callback as they come off the wire, awaiting the
 * callback before pulling the next one.
 */
async function deliverChunks(
  body: ReadableStream<Uint8Array> | null,
  onChunk: ChunkHandler,
): Promise<number> {
  if (!body) return 0;
  const reader = body.getReader();
  let received = 0;
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (value.byteLength === 0) continue;
      received += value.byteLength;
      try {
        await onChunk(value);
      } catch (error) {
        await reader.cancel(error);
        throw error;
      }
    }
  } finally {
    reader.releaseLock();
  }
  return received;
}

/**
 * Reads a whole error body. A body that cannot be read still yields an
 * error, only without the server's payload.
 */
async function bufferErrorBody(
  response: Response,
  logger: Logger,
): Promise<string> {
  try {
    return toText(new Uint8Array(await response.arrayBuffer()));
  } catch (error) {
    logger.warn({ err: error }, "Failed to read error response body");
    return "";
  }
}
