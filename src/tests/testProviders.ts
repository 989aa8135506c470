import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { extractJson, withTimeout } from "../core/providers";

describe("extractJson", () => {
  it("finds the object inside fenced or chatty output", () => {
    assert.deepEqual(extractJson('Sure!\n```json\n{"is_scam": false, "confidence": 0.1}\n```'), {
      is_scam: false,
      confidence: 0.1
    });
  });

  it("returns null when there is no object", () => {
    assert.equal(extractJson(""), null);
    assert.equal(extractJson("no json here"), null);
    assert.equal(extractJson("{broken"), null);
    assert.equal(extractJson("{not: valid}"), null);
  });
});

describe("withTimeout", () => {
  it("passes through a fast result", async () => {
    assert.equal(await withTimeout(Promise.resolve("ok"), 50, "fast"), "ok");
  });

  it("rejects a slow call with a labelled error", async () => {
    let timer: NodeJS.Timeout | undefined;
    const slow = new Promise<string>((resolve) => {
      timer = setTimeout(() => resolve("late"), 200);
    });
    await assert.rejects(withTimeout(slow, 10, "gemini"), { message: "gemini timeout after 10ms" });
    clearTimeout(timer);
  });
});
