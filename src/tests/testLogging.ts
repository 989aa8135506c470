import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { safeStringify, sanitizeHeaders } from "../utils/logging";
import { maskDigitRuns, maskDigits } from "../utils/mask";

describe("masking", () => {
  it("masks digit runs in log lines", () => {
    assert.equal(maskDigitRuns("call 9876543210 ref 12"), "call ********10 ref 12");
  });

  it("masks a value down to its last digits", () => {
    assert.equal(maskDigits("+91-98765-43210"), "+**-*****-*3210");
    assert.equal(maskDigits("ref 42"), "ref 42");
  });
});

describe("log helpers", () => {
  it("hides the API key and lower-cases header names", () => {
    assert.deepEqual(sanitizeHeaders({ "x-api-key": "test-secret", "content-type": "application/json" }), {
      "x-api-key": "*******cret",
      "content-type": "application/json"
    });
  });

  it("masks and caps serialized payloads", () => {
    assert.equal(safeStringify({ phone: "9876543210" }, 100), '{"phone":"********10"}');
    assert.equal(safeStringify({ a: "xxxxxxxxxx" }, 5), '{"a":...(truncated)');
  });
});
