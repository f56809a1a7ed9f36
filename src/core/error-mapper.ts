import { XMLParser } from "fast-xml-parser";

import { TransportError } from "../error";
import { isPlainObject } from "../utils/is";
import { headersToObject } from "./logger";

export const REQUEST_ID_HEADER = "x-oss-request-id";

export interface ErrorResponseInput {
  status: number;
  statusText?: string;
  headers: Headers;
  /** Fully buffered, already decoded response body. */
  body: string;
  method: string;
  resource: string;
}

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
});

/**
 * Converts a failed response into a {@link TransportError}. Never throws: a
 * body that is neither an XML `<Error>` document nor a JSON object is kept
 * as raw text and the message falls back to the status line.
 *
 * @param input - Status, headers and buffered body of the response.
 */
export function mapErrorResponse(input: ErrorResponseInput): TransportError {
  const details = parseErrorBody(input.body);
  const requestId =
    input.headers.get(REQUEST_ID_HEADER) ?? details.RequestId ?? undefined;

  return new TransportError({
    message:
      details.Message ||
      input.statusText ||
      details.Code ||
      `HTTP ${input.status}`,
    status: input.status,
    code: details.Code,
    requestId,
    hostId: details.HostId,
    method: input.method,
    resource: input.resource,
    headers: headersToObject(input.headers),
    body: input.body,
    details,
  });
}

/**
 * Reads the vendor error fields (`Code`, `Message`, `RequestId`, `HostId`,
 * ...) from an XML or JSON error body. Returns an empty record when the body
 * has neither shape.
 */
export function parseErrorBody(body: string): Record<string, string> {
  const text = body.trim();
  if (text.startsWith("<")) {
    return parseXmlError(text);
  }
  if (text.startsWith("{")) {
    return parseJsonError(text);
  }
  return {};
}

// #region Internal

function parseXmlError(text: string): Record<string, string> {
  let document: unknown;
  try {
    document = xmlParser.parse(text);
  } catch {
    return {};
  }
  if (!isPlainObject(document)) return {};
  const root = document.Error;
  return isPlainObject(root) ? pickStrings(root) : {};
}

function parseJsonError(text: string): Record<string, string> {
  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch {
    return {};
  }
  if (!isPlainObject(document)) return {};
  const nested = document.Error;
  return pickStrings(isPlainObject(nested) ? nested : document);
}

function pickStrings(record: Record<string, unknown>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "string") {
      result[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      result[key] = String(value);
    }
  }
  return result;
}
