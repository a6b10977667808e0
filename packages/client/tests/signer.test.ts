import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createHmac } from "node:crypto";
import { SigningConfigurationError } from "../src/errors.js";
import { RequestSigner, bodyDigest, canonicalQuery, canonicalString, type UnsignedRequest } from "../src/signer.js";

const identity = { deviceId: "device-1", clientId: "client-1", installId: "install-1" };

const request: UnsignedRequest = {
  method: "post",
  path: "/bff/v2/sendMoney",
  query: { size: "20", a: "b c" },
  body: '{"amount":100}',
  timestamp: 1700000000000
};

describe("RequestSigner", () => {
  it("sorts and encodes query parameters", () => {
    assert.equal(canonicalQuery({ size: "20", a: "b c" }), "a=b%20c&size=20");
    assert.equal(canonicalQuery(), "");
  });

  it("hashes an empty body as the empty string", () => {
    assert.equal(bodyDigest(), "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855");
  });

  it("builds the canonical string in field order", () => {
    assert.equal(
      canonicalString({ ...request, body: undefined }, identity),
      [
        "POST",
        "/bff/v2/sendMoney?a=b%20c&size=20",
        "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
        "device-1",
        "client-1",
        "install-1",
        "1700000000000"
      ].join("\n")
    );
  });

  it("produces identical headers for identical inputs", () => {
    const signer = new RequestSigner("test-signing-key");

    const first = signer.sign(request, identity, "T1");
    const second = new RequestSigner("test-signing-key").sign({ ...request }, { ...identity }, "T1");

    assert.deepEqual(first, second);
  });

  it("signs the canonical string with HMAC-SHA256", () => {
    const headers = new RequestSigner("test-signing-key").sign(request, identity, "T1");
    const expected = createHmac("sha256", "test-signing-key").update(canonicalString(request, identity)).digest("base64");

    assert.deepEqual(headers, {
      "Client-UUID": "client-1",
      "Device-UUID": "device-1",
      "Install-Id": "install-1",
      "Client-Timestamp": "1700000000000",
      "Client-Signature": expected,
      "Client-Signature-Version": "1",
      Authorization: "Bearer T1"
    });
  });

  it("changes the signature when the timestamp or body changes", () => {
    const signer = new RequestSigner("test-signing-key");
    const base = signer.sign(request, identity)["Client-Signature"];

    assert.notEqual(signer.sign({ ...request, timestamp: request.timestamp + 1 }, identity)["Client-Signature"], base);
    assert.notEqual(signer.sign({ ...request, body: '{"amount":101}' }, identity)["Client-Signature"], base);
  });

  it("omits Authorization without a token", () => {
    const headers = new RequestSigner("test-signing-key").sign(request, identity);

    assert.equal("Authorization" in headers, false);
  });

  it("fails with a configuration error when key material is missing", () => {
    assert.throws(() => new RequestSigner(undefined).sign(request, identity), SigningConfigurationError);
    assert.throws(() => new RequestSigner("").sign(request, identity), {
      code: "SIGNING_CONFIGURATION_ERROR",
      stage: "signing"
    });
  });

  it("fails with a configuration error when the identity is incomplete", () => {
    assert.throws(
      () => new RequestSigner("test-signing-key").sign(request, { ...identity, installId: "" }),
      SigningConfigurationError
    );
  });
});
