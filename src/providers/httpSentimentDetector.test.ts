import test from "node:test";
import assert from "node:assert/strict";
import { CollaboratorError } from "./errors";
import { HttpSentimentDetector, parseSentimentResponse, SentimentFetchLike } from "./httpSentimentDetector";

interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: unknown;
}

function fakeFetch(status: number, body: string, calls: RecordedCall[] = []): SentimentFetchLike {
  return async (url, init) => {
    calls.push({ url, method: init.method, headers: init.headers, body: JSON.parse(init.body) });
    return { ok: status >= 200 && status < 300, status, text: async () => body };
  };
}

test("posts the text to <base>/sentiment and maps the response", async () => {
  const calls: RecordedCall[] = [];
  const detector = new HttpSentimentDetector({
    baseUrl: "http://sentiment.local/",
    token: "test-secret",
    fetchFn: fakeFetch(200, JSON.stringify({ label: "NEGATIVE", scores: { Negative: 0.8, Positive: 0.1, note: "x" } }), calls),
  });

  const result = await detector.detectSentiment("awful", "en");

  assert.deepEqual(result, { label: "NEGATIVE", scores: { Negative: 0.8, Positive: 0.1 } });
  assert.deepEqual(calls, [
    {
      url: "http://sentiment.local/sentiment",
      method: "POST",
      headers: { "Content-Type": "application/json", Authorization: "Bearer test-secret" },
      body: { text: "awful", languageCode: "en" },
    },
  ]);
});

test("server errors are retryable and client errors are fatal", async () => {
  const busy = new HttpSentimentDetector({ baseUrl: "http://sentiment.local", fetchFn: fakeFetch(503, "busy") });
  await assert.rejects(busy.detectSentiment("text", "en"), (error: unknown) => {
    assert.ok(error instanceof CollaboratorError);
    assert.equal(error.retryable, true);
    assert.equal(error.message, "Sentiment service responded 503: busy");
    return true;
  });

  const rejected = new HttpSentimentDetector({ baseUrl: "http://sentiment.local", fetchFn: fakeFetch(400, "bad") });
  await assert.rejects(rejected.detectSentiment("text", "en"), (error: unknown) => {
    assert.ok(error instanceof CollaboratorError);
    assert.equal(error.retryable, false);
    return true;
  });
});

test("an abort from the caller reaches the request", async () => {
  const controller = new AbortController();
  let seen: AbortSignal | undefined;
  const detector = new HttpSentimentDetector({
    baseUrl: "http://sentiment.local",
    fetchFn: async (_url, init) => {
      seen = init.signal;
      controller.abort();
      return { ok: true, status: 200, text: async () => JSON.stringify({ label: "NEUTRAL", scores: {} }) };
    },
  });

  await detector.detectSentiment("text", "en", controller.signal);
  assert.equal(seen?.aborted, true);
});

test("malformed responses are fatal", () => {
  assert.throws(() => parseSentimentResponse("not json"), /invalid JSON/);
  assert.throws(() => parseSentimentResponse(JSON.stringify({ scores: {} })), /missing label or scores/);
  assert.throws(() => parseSentimentResponse(JSON.stringify({ label: "POSITIVE", scores: [] })), /missing label or scores/);
});
