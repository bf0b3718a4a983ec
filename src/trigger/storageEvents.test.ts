import test from "node:test";
import assert from "node:assert/strict";
import { decodeObjectKey, InvalidTriggerEventError, parseStorageEvent } from "./storageEvents";

const filter = { ignoreKeyPrefixes: ["results/"] };

function s3Record(bucket: string, key: string, eventName = "ObjectCreated:Put") {
  return { eventName, s3: { bucket: { name: bucket }, object: { key } } };
}

test("extracts document references from S3 created events", () => {
  const refs = parseStorageEvent(
    JSON.stringify({ Records: [s3Record("docs", "a.pdf"), s3Record("docs", "reports/b.pdf", "ObjectCreated:CompleteMultipartUpload")] }),
    filter,
  );

  assert.deepEqual(refs, [
    { container: "docs", key: "a.pdf" },
    { container: "docs", key: "reports/b.pdf" },
  ]);
});

test("object keys are form-decoded", () => {
  const refs = parseStorageEvent({ Records: [s3Record("docs", "annual+report%282024%29.pdf")] }, filter);
  assert.deepEqual(refs, [{ container: "docs", key: "annual report(2024).pdf" }]);
  assert.equal(decodeObjectKey("bad%E0%A4%A"), "bad%E0%A4%A");
});

test("removal events, result objects and duplicates are dropped", () => {
  const refs = parseStorageEvent(
    {
      Records: [
        s3Record("docs", "a.pdf"),
        s3Record("docs", "old.pdf", "ObjectRemoved:Delete"),
        s3Record("docs", "results/a.pdf.json"),
        s3Record("docs", "a.pdf"),
      ],
    },
    filter,
  );
  assert.deepEqual(refs, [{ container: "docs", key: "a.pdf" }]);
});

test("the S3 test event yields nothing", () => {
  assert.deepEqual(parseStorageEvent({ Service: "Amazon S3", Event: "s3:TestEvent", Bucket: "docs" }, filter), []);
});

test("accepts a plain documentRef and SNS-wrapped notifications", () => {
  assert.deepEqual(parseStorageEvent({ documentRef: { container: "docs", key: "a.pdf" } }, filter), [
    { container: "docs", key: "a.pdf" },
  ]);

  const wrapped = { Type: "Notification", Message: JSON.stringify({ Records: [s3Record("docs", "b.pdf")] }) };
  assert.deepEqual(parseStorageEvent(JSON.stringify(wrapped), filter), [{ container: "docs", key: "b.pdf" }]);
});

test("rejects bodies that are not storage events", () => {
  assert.throws(() => parseStorageEvent("{not json", filter), InvalidTriggerEventError);
  assert.throws(() => parseStorageEvent("[]", filter), InvalidTriggerEventError);
  assert.throws(() => parseStorageEvent({ hello: "world" }, filter), InvalidTriggerEventError);
  assert.throws(
    () => parseStorageEvent({ Records: [{ eventName: "ObjectCreated:Put", s3: { bucket: {} } }] }, filter),
    /missing bucket name or object key/,
  );
});
