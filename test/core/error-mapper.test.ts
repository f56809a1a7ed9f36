import { describe, expect, it } from "vitest";

import { mapErrorResponse, parseErrorBody } from "../../src/core/error-mapper";
import { TransportError } from "../../src/error";

const request = { method: "GET", resource: "/b/k" };

describe("error mapper", () => {
  it("maps an XML error document and prefers the request id header", () => {
    const body = `<?xml version="1.0" encoding="UTF-8"?>
<Error>
  <Code>AccessDenied</Code>
  <Message>You have no right to access this object.</Message>
  <RequestId>body-id</RequestId>
  <HostId>b.oss.example.com</HostId>
</Error>`;

    const error = mapErrorResponse({
      ...request,
      status: 403,
      statusText: "Forbidden",
      headers: new Headers({ "x-oss-request-id": "header-id" }),
      body,
    });

    expect(error).toBeInstanceOf(TransportError);
    expect(error.status).toBe(403);
    expect(error.code).toBe("AccessDenied");
    expect(error.message).toBe("You have no right to access this object.");
    expect(error.requestId).toBe("header-id");
    expect(error.hostId).toBe("b.oss.example.com");
    expect(error.details.RequestId).toBe("body-id");
    expect(error.headers).toEqual({ "x-oss-request-id": "header-id" });
    expect(error.body).toBe(body);
    expect(error.method).toBe("GET");
    expect(error.resource).toBe("/b/k");
  });

  it("maps a JSON error body", () => {
    const error = mapErrorResponse({
      ...request,
      status: 404,
      headers: new Headers(),
      body: '{"Code":"NoSuchKey","RequestId":"abc123"}',
    });

    expect(error.status).toBe(404);
    expect(error.code).toBe("NoSuchKey");
    expect(error.requestId).toBe("abc123");
    expect(error.message).toBe("NoSuchKey");
  });

  it("reads fields nested under an Error key", () => {
    expect(
      parseErrorBody('{"Error":{"Code":"InvalidArgument","Count":2}}'),
    ).toEqual({ Code: "InvalidArgument", Count: "2" });
  });

  it("falls back to the status line for empty and unstructured bodies", () => {
    const empty = mapErrorResponse({
      ...request,
      status: 503,
      statusText: "Service Unavailable",
      headers: new Headers(),
      body: "",
    });
    expect(empty.message).toBe("Service Unavailable");
    expect(empty.code).toBeUndefined();
    expect(empty.requestId).toBeUndefined();
    expect(empty.body).toBe("");

    const plain = mapErrorResponse({
      ...request,
      status: 502,
      headers: new Headers(),
      body: "upstream unavailable",
    });
    expect(plain.message).toBe("HTTP 502");
    expect(plain.body).toBe("upstream unavailable");
    expect(plain.details).toEqual({});
  });

  it("keeps malformed bodies instead of throwing", () => {
    const json = mapErrorResponse({
      ...request,
      status: 500,
      headers: new Headers(),
      body: '{"Code":',
    });
    expect(json.code).toBeUndefined();
    expect(json.body).toBe('{"Code":');

    const xml = mapErrorResponse({
      ...request,
      status: 500,
      headers: new Headers(),
      body: "<Error><Code>Broken",
    });
    expect(xml.status).toBe(500);
    expect(xml.body).toBe("<Error><Code>Broken");
  });

  it("ignores documents without an Error root", () => {
    expect(parseErrorBody("<Other><Code>X</Code></Other>")).toEqual({});
    expect(parseErrorBody("[1, 2]")).toEqual({});
  });

  it("renders a one-line summary", () => {
    const error = mapErrorResponse({
      ...request,
      status: 404,
      headers: new Headers({ "x-oss-request-id": "abc123" }),
      body: "<Error><Code>NoSuchKey</Code><Message>Missing</Message></Error>",
    });

    expect(error.toString()).toBe(
      "TransportError: Missing status=404 code=NoSuchKey requestId=abc123 GET /b/k",
    );
  });
});
