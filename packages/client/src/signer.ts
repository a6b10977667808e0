import { createHash, createHmac } from "node:crypto";
import type { DeviceIdentity } from "@paybridge/types";
import { SigningConfigurationError } from "./errors.js";

export const SIGNATURE_VERSION = "1";

export interface UnsignedRequest {
  method: string;
  path: string;
  query?: Record<string, string>;
  body?: Uint8Array | string;
  /** Epoch milliseconds. */
  timestamp: number;
}

export function canonicalQuery(query: Record<string, string> = {}): string {
  return Object.keys(query)
    .sort()
    .map((key) => `${encodeURIComponent(key)}=${encodeURIComponent(query[key] ?? "")}`)
    .join("&");
}

export function bodyDigest(body: Uint8Array | string = ""): string {
  return createHash("sha256").update(body).digest("hex");
}

export function canonicalString(request: UnsignedRequest, identity: DeviceIdentity): string {
  const query = canonicalQuery(request.query);
  return [
    request.method.toUpperCase(),
    query ? `${request.path}?${query}` : request.path,
    bodyDigest(request.body),
    identity.deviceId,
    identity.clientId,
    identity.installId,
    String(request.timestamp)
  ].join("\n");
}

export class RequestSigner {
  constructor(private readonly signingKey: string | undefined) {}

  sign(request: UnsignedRequest, identity: DeviceIdentity, token?: string): Record<string, string> {
    if (!this.signingKey) {
      throw new SigningConfigurationError("signingKey is not configured");
    }
    if (!identity.deviceId || !identity.clientId || !identity.installId) {
      throw new SigningConfigurationError("Device identity is incomplete");
    }

    const signature = createHmac("sha256", this.signingKey)
      .update(canonicalString(request, identity))
      .digest("base64");

    const headers: Record<string, string> = {
      "Client-UUID": identity.clientId,
      "Device-UUID": identity.deviceId,
      "Install-Id": identity.installId,
      "Client-Timestamp": String(request.timestamp),
      "Client-Signature": signature,
      "Client-Signature-Version": SIGNATURE_VERSION
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }
    return headers;
  }
}
