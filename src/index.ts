export { OSSClient } from "./client";
export { StreamProtocolError, TransportError } from "./error";
export {
  StreamPayload,
  StreamWriter,
  createLogger,
  loadConfig,
  type Producer,
} from "./core";
export { VERSION } from "./version";
export type * from "./types";
