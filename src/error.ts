/**
 * Structured error raised for every response with a status of 300 or above.
 * Carries the server's diagnostics (request id, error code, raw body) next to
 * the verb and resource that produced it.
 */
export class TransportError extends Error {
  readonly status: number;
  readonly code?: string;
  readonly requestId?: string;
  readonly hostId?: string;
  readonly method: string;
  readonly resource: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly details: Readonly<Record<string, string>>;

  /**
   * @param init - Response metadata captured by the error mapper.
   */
  constructor(init: {
    message: string;
    status: number;
    method: string;
    resource: string;
    code?: string;
    requestId?: string;
    hostId?: string;
    headers?: Record<string, string>;
    body?: string;
    details?: Record<string, string>;
  }) {
    super(init.message);
    this.name = "TransportError";
    this.status = init.status;
    this.code = init.code;
    this.requestId = init.requestId;
    this.hostId = init.hostId;
    this.method = init.method;
    this.resource = init.resource;
    this.headers = Object.freeze({ ...init.headers });
    this.body = init.body ?? "";
    this.details = Object.freeze({ ...init.details });
  }

  override toString(): string {
    const parts = [`${this.name}: ${this.message}`, `status=${this.status}`];
    if (this.code) parts.push(`code=${this.code}`);
    if (this.requestId) parts.push(`requestId=${this.requestId}`);
    parts.push(`${this.method} ${this.resource}`);
    return parts.join(" ");
  }
}

/**
 * Raised from `StreamWriter.read` when the producer failed or the session was
 * used outside its single-consumer contract.
 */
export class StreamProtocolError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StreamProtocolError";
  }
}
