export * from "./canonical";
export * from "./config";
export * from "./content-type";
export * from "./endpoint";
export * from "./error-mapper";
export * from "./logger";
export * from "./request";
export * from "./serializer";
export * from "./signer";
export * from "./stream";
export * from "./transport";
