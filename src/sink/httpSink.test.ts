import test from "node:test";
import assert from "node:assert/strict";
import { FetchLike, HttpSink, isRetriableStatus } from "./httpSink";
import { ExecutionEvent } from "./types";

const event: ExecutionEvent = {
  type: "stage_completed",
  executionId: "exec_1",
  documentRef: { container: "docs", key: "a.pdf" },
  status: "running",
  stage: "metadata",
  at: "2024-05-01T10:00:00.000Z",
};

function scriptedFetch(statuses: number[], calls: Array<{ url: string; headers: Record<string, string>; body: string }>): FetchLike {
  return async (url, init) => {
    calls.push({ url, headers: init.headers, body: init.body });
    const status = statuses.shift() ?? 200;
    return { ok: status >= 200 && status < 300, status, text: async () => `status ${status}` };
  };
}

test("posts events with an idempotency key and bearer token", async () => {
  const calls: Array<{ url: string; headers: Record<string, string>; body: string }> = [];
  const sink = new HttpSink({
    endpoint: "https://events.local/ingest",
    token: "test-secret",
    fetchFn: scriptedFetch([200], calls),
    retryDelayMs: 0,
  });

  await sink.publishExecutionEvents([event, { ...event, type: "execution_succeeded", stage: undefined, status: "succeeded" }]);

  assert.equal(calls.length, 1);
  assert.equal(calls[0].url, "https://events.local/ingest");
  assert.equal(calls[0].headers.Authorization, "Bearer test-secret");
  assert.equal(calls[0].headers["Idempotency-Key"], "exec_1:stage_completed:metadata,exec_1:execution_succeeded:");
  const body: unknown = JSON.parse(calls[0].body);
  assert.ok(typeof body === "object" && body !== null && "events" in body && Array.isArray(body.events));
  assert.equal(body.events.length, 2);
});

test("retries retriable statuses and gives up on permanent ones", async () => {
  const calls: Array<{ url: string; headers: Record<string, string>; body: string }> = [];
  const recovering = new HttpSink({ endpoint: "https://events.local", fetchFn: scriptedFetch([503, 429, 200], calls), retryDelayMs: 0 });
  await recovering.publishExecutionEvents([event]);
  assert.equal(calls.length, 3);

  const rejecting = new HttpSink({ endpoint: "https://events.local", fetchFn: scriptedFetch([400], []), retryDelayMs: 0 });
  await assert.rejects(rejecting.publishExecutionEvents([event]), /permanent error 400: status 400/);

  const exhausted = new HttpSink({
    endpoint: "https://events.local",
    fetchFn: scriptedFetch([500, 500, 500], []),
    maxRetries: 1,
    retryDelayMs: 0,
  });
  await assert.rejects(exhausted.publishExecutionEvents([event]), /exhausted retries on status 500/);
});

test("an unconfigured sink fails and an empty batch is a no-op", async () => {
  const calls: Array<{ url: string; headers: Record<string, string>; body: string }> = [];
  await new HttpSink({ fetchFn: scriptedFetch([], calls) }).publishExecutionEvents([]);
  assert.equal(calls.length, 0);
  await assert.rejects(new HttpSink({ fetchFn: scriptedFetch([], calls) }).publishExecutionEvents([event]), /HTTP sink is not configured/);
});

test("retriable statuses", () => {
  assert.deepEqual(
    [200, 400, 404, 408, 429, 500, 503].map(isRetriableStatus),
    [false, false, false, true, true, true, true],
  );
});
