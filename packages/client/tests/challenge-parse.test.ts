import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { hasChallengeMarker, parseChallenge } from "../src/challenge/parse.js";

describe("parseChallenge", () => {
  it("reads proof-of-work parameters from a JSON body", () => {
    assert.deepEqual(parseChallenge('{"nonce":"abc","difficulty":2,"key":"k1"}'), {
      proofOfWork: { nonce: "abc", difficulty: 2, key: "k1" }
    });
  });

  it("reads parameters nested under challenge, with a verify URL", () => {
    const body = JSON.stringify({
      challenge: { nonce: "n1", difficulty: "3", verifyUrl: "https://waf.example/verify" }
    });

    assert.deepEqual(parseChallenge(body), {
      proofOfWork: { nonce: "n1", difficulty: 3, key: "", verifyUrl: "https://waf.example/verify" }
    });
  });

  it("reads proof-of-work parameters from a challenge page script", () => {
    const html = `<html><head><script src="https://edge.example/challenge.js"></script></head>
      <body><script>AwsWafIntegration.checkForceRefresh({ nonce: 'n2', difficulty: 4, key: "k2" });</script></body></html>`;

    assert.deepEqual(parseChallenge(html), {
      proofOfWork: { nonce: "n2", difficulty: 4, key: "k2" }
    });
  });

  it("describes a CAPTCHA page as a puzzle", () => {
    const html = `<div id="captcha"></div>
      <script>AwsWafCaptcha.renderCaptcha(document.getElementById("captcha"), { apiKey: "public", apiUrl: "https://captcha.example/api", problem: "p1" });</script>`;

    assert.deepEqual(parseChallenge(html), {
      puzzle: {
        apiUrl: "https://captcha.example/api",
        imageUrl: undefined,
        problem: "p1",
        raw: { apiUrl: "https://captcha.example/api", problem: "p1" }
      }
    });
  });

  it("returns null for unrecognised shapes", () => {
    assert.equal(parseChallenge('{"message":"Forbidden"}'), null);
    assert.equal(parseChallenge('{"nonce":"abc"}'), null);
    assert.equal(parseChallenge('{"nonce":"abc","difficulty":-1}'), null);
    assert.equal(parseChallenge("<html>maintenance</html>"), null);
    assert.equal(parseChallenge("<script>var token = 'aws-waf-token';</script>"), null);
    assert.equal(parseChallenge("{broken"), null);
  });
});

describe("hasChallengeMarker", () => {
  it("recognises edge challenge markers", () => {
    assert.equal(hasChallengeMarker("cookie aws-waf-token missing"), true);
    assert.equal(hasChallengeMarker("<script src=\"https://x.challenge.aws/\"></script>"), true);
    assert.equal(hasChallengeMarker('{"message":"Forbidden"}'), false);
  });
});
