import test, { after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { classifyProviderError, CollaboratorError } from "./errors";
import { LocalObjectStore } from "./localObjectStore";

const root = fs.mkdtempSync(path.join(os.tmpdir(), "docpipe-objects-"));

after(() => {
  fs.rmSync(root, { recursive: true, force: true });
});

test("writes, reads and deletes objects under <root>/<container>/<key>", async () => {
  const store = new LocalObjectStore(root);
  const ref = { container: "docs", key: "results/a.pdf.json" };

  const location = await store.putObject(ref, '{"ok":true}', "application/json");
  const expectedPath = path.join(root, "docs", "results", "a.pdf.json");

  assert.equal(fileURLToPath(location), expectedPath);
  assert.equal(fs.readFileSync(expectedPath, "utf-8"), '{"ok":true}');
  assert.equal((await store.getObject(ref)).toString("utf-8"), '{"ok":true}');
  assert.deepEqual(fs.readdirSync(path.dirname(expectedPath)), ["a.pdf.json"]);

  await store.deleteObject(ref);
  assert.equal(fs.existsSync(expectedPath), false);
  await store.deleteObject(ref);
});

test("a missing object is a fatal provider error", async () => {
  const store = new LocalObjectStore(root);
  await assert.rejects(store.getObject({ container: "docs", key: "missing.pdf" }), (error: unknown) => {
    assert.equal(classifyProviderError(error), "fatal");
    return true;
  });
});

test("keys that escape the storage root are rejected", () => {
  const store = new LocalObjectStore(root);

  assert.throws(() => store.resolvePath({ container: "docs", key: "../../etc/passwd" }), CollaboratorError);
  assert.throws(() => store.resolvePath({ container: "../outside", key: "a.pdf" }), CollaboratorError);
  assert.equal(store.resolvePath({ container: "docs", key: "nested/a.pdf" }), path.join(root, "docs", "nested", "a.pdf"));
});
