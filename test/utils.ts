import pino from "pino";
import { vi } from "vitest";

import type { FetchInit, Fetcher } from "../src/types";

export interface CapturedRequest {
  url: string;
  method: string;
  headers: Headers;
  body: Uint8Array;
  init: FetchInit;
}

export const silentLogger = pino({ level: "silent" });

/**
 * Logger that keeps every emitted line, parsed, for assertions.
 */
export function createRecordingLogger() {
  const lines: unknown[] = [];
  const logger = pino(
    { level: "error" },
    {
      write(line: string) {
        lines.push(JSON.parse(line));
      },
    },
  );
  return { logger, lines };
}

/**
 * Fetch stand-in that drains the request body (driving streaming uploads to
 * completion) before handing the captured request to the responder.
 */
export function createFetchMock(
  responder: (request: CapturedRequest) => Promise<Response> | Response,
) {
  const requests: CapturedRequest[] = [];
  const fetch = vi.fn<Fetcher>(async (url, init) => {
    const request: CapturedRequest = {
      url,
      method: init.method ?? "GET",
      headers: new Headers(init.headers),
      body: await readBody(init.body),
      init,
    };
    requests.push(request);
    return await responder(request);
  });
  return { fetch, requests };
}

export function text(bytes: Uint8Array | undefined): string {
  return new TextDecoder().decode(bytes);
}

async function readBody(
  body: BodyInit | null | undefined,
): Promise<Uint8Array> {
  if (body === undefined || body === null) {
    return new Uint8Array(0);
  }
  return new Uint8Array(await new Response(body).arrayBuffer());
}
