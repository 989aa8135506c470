import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { normalizeReplyStyle, validateReply } from "../core/style";

const ctx = { lastReplies: [], maxLength: 160 };

describe("normalizeReplyStyle", () => {
  it("strips quotes and formal words and keeps one question", () => {
    const result = normalizeReplyStyle('"Kindly tell me which branch?  I am confused."', ctx);
    assert.deepEqual(result, { ok: true, text: "tell me which branch?" });
  });

  it("drops a role prefix and joins lines", () => {
    const result = normalizeReplyStyle("You: ok sir\nwhat next?", ctx);
    assert.deepEqual(result, { ok: true, text: "ok sir what next?" });
  });

  it("truncates long drafts", () => {
    const result = normalizeReplyStyle("This is a fairly long reply without any question mark at all", {
      lastReplies: [],
      maxLength: 20
    });
    assert.deepEqual(result, { ok: true, text: "This is a fairly..." });
  });

  it("rejects digit runs", () => {
    assert.deepEqual(normalizeReplyStyle("My OTP is 123456", ctx), { ok: false, reason: "digits" });
  });

  it("rejects anything that gives the game away", () => {
    assert.deepEqual(normalizeReplyStyle("Are you a bot?", ctx), { ok: false, reason: "revealing" });
    assert.deepEqual(normalizeReplyStyle("Is this a scam?", ctx), { ok: false, reason: "revealing" });
  });

  it("rejects a repeat of a recent reply", () => {
    const result = normalizeReplyStyle("which number can I call you on", {
      lastReplies: ["Which number can I call you on?"],
      maxLength: 160
    });
    assert.deepEqual(result, { ok: false, reason: "repeat" });
  });
});

describe("validateReply", () => {
  it("rejects empty replies and requests for secrets", () => {
    assert.deepEqual(validateReply("", ctx), { ok: false, reason: "empty" });
    assert.deepEqual(validateReply("send me your otp now", ctx), { ok: false, reason: "sensitive" });
  });
});
