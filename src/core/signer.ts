import { createHash, createHmac } from "node:crypto";

import type { SubResources } from "../types";
import { buildCanonicalString } from "./canonical";

export interface SigningCredentials {
  accessKeyId?: string;
  accessKeySecret?: string;
}

export interface SignRequestInput {
  method: string;
  headers: Headers;
  resourcePath: string;
  subResources?: SubResources;
  credentials: SigningCredentials;
}

export type SignRequestResult =
  | { signed: true; canonical: string; signature: string }
  | { signed: false; reason: "missing-credentials" };

/**
 * Base64 HMAC-SHA1 of the canonical string, keyed by the access key secret.
 *
 * @param secret - Access key secret.
 * @param canonical - Output of {@link buildCanonicalString}.
 */
export function computeSignature(secret: string, canonical: string): string {
  return createHmac("sha1", secret).update(canonical, "utf8").digest("base64");
}

/**
 * Signs the request in place by setting `authorization` to
 * `OSS <access-key-id>:<signature>`.
 *
 * Without both an access key id and secret nothing is set and the result
 * reports `signed: false`; the request then goes out anonymously.
 *
 * @param input - Finalized headers and resource of the request.
 */
export function signRequest(input: SignRequestInput): SignRequestResult {
  const { accessKeyId, accessKeySecret } = input.credentials;
  if (!accessKeyId || !accessKeySecret) {
    input.headers.delete("authorization");
    return { signed: false, reason: "missing-credentials" };
  }

  const canonical = buildCanonicalString({
    method: input.method,
    headers: input.headers,
    resourcePath: input.resourcePath,
    subResources: input.subResources,
  });
  const signature = computeSignature(accessKeySecret, canonical);
  input.headers.set("authorization", `OSS ${accessKeyId}:${signature}`);
  return { signed: true, canonical, signature };
}

/**
 * Value of the `Content-MD5` header: base64 of the body's MD5 digest.
 */
export function getContentMd5(body: Uint8Array): string {
  return createHash("md5").update(body).digest("base64");
}
