import test from "node:test";
import assert from "node:assert/strict";
import { InvalidDocumentRefError } from "./errors";
import { assertDocumentRef, createExecutionId, documentKey } from "./executionId";
import { clonePayload, createInitialPayload, mergePayload, omitKeys } from "./payload";

test("initial payload names the bucket and key", () => {
  assert.deepEqual(createInitialPayload({ container: "docs", key: "a.pdf" }), { bucket: "docs", key: "a.pdf" });
});

test("merge reports added and removed keys", () => {
  const result = mergePayload({ bucket: "docs", key: "a.pdf" }, { key: "b.pdf", text: "hello" });

  assert.deepEqual(result.payload, { bucket: "docs", key: "b.pdf", text: "hello" });
  assert.deepEqual(result.addedKeys, ["text"]);
  assert.deepEqual(result.removedKeys, ["bucket"]);
});

test("merged payloads share no objects with their inputs", () => {
  const updated = { bucket: "docs", metadata: { title: "a.pdf" } };
  const result = mergePayload({ bucket: "docs" }, updated);
  updated.metadata.title = "changed";

  assert.deepEqual(result.payload.metadata, { title: "a.pdf" });
});

test("clone is deep and omitKeys leaves the source alone", () => {
  const payload = { bucket: "docs", analysis: { sentiment: "POSITIVE" } };
  const copy = clonePayload(payload);

  assert.notEqual(copy.analysis, payload.analysis);
  assert.deepEqual(omitKeys(payload, ["analysis"]), { bucket: "docs" });
  assert.deepEqual(payload, { bucket: "docs", analysis: { sentiment: "POSITIVE" } });
});

test("execution ids are deterministic per document and generation", () => {
  const ref = { container: "docs", key: "a.pdf" };

  assert.equal(createExecutionId(ref), createExecutionId({ container: "docs", key: "a.pdf" }));
  assert.match(createExecutionId(ref), /^exec_[0-9a-f]{32}$/);
  assert.notEqual(createExecutionId(ref), createExecutionId({ container: "docs", key: "b.pdf" }));
  assert.notEqual(createExecutionId(ref), createExecutionId(ref, 1));
  // the encoding keeps container/key boundaries distinct
  assert.notEqual(createExecutionId({ container: "a", key: "bc" }), createExecutionId({ container: "ab", key: "c" }));
  // keys may carry newlines and digits that look like a generation suffix
  assert.notEqual(createExecutionId({ container: "docs", key: "k\n1" }), createExecutionId({ container: "docs", key: "k" }, 1));
  assert.notEqual(createExecutionId({ container: "a\nb", key: "c" }), createExecutionId({ container: "a", key: "b\nc" }));
  assert.notEqual(documentKey({ container: "a\nb", key: "c" }), documentKey({ container: "a", key: "b\nc" }));
});

test("document references need a container and a key", () => {
  assert.throws(() => assertDocumentRef({ container: "", key: "a.pdf" }), InvalidDocumentRefError);
  assert.throws(() => assertDocumentRef({ container: "docs", key: "" }), InvalidDocumentRefError);
  assert.doesNotThrow(() => assertDocumentRef({ container: "docs", key: "a.pdf" }));
});
