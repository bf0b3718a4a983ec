import test, { after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { createTestConfig } from "../testing/fakes";
import { LocalJsonlSink } from "./localJsonlSink";
import { ExecutionEvent } from "./types";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docpipe-manifests-"));

after(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test("appends one JSON line per event tagged with the run id", async () => {
  const sink = new LocalJsonlSink(createTestConfig({ outputDirs: { manifests: dir, objects: dir } }), "run_test");
  const event: ExecutionEvent = {
    type: "execution_succeeded",
    executionId: "exec_1",
    documentRef: { container: "docs", key: "a.pdf" },
    status: "succeeded",
    at: "2024-05-01T10:00:00.000Z",
    resultLocation: "s3://docs/results/a.pdf.json",
  };

  await sink.publishExecutionEvents([event]);
  await sink.publishExecutionEvents([{ ...event, executionId: "exec_2" }]);

  const lines = fs.readFileSync(path.join(dir, "executions.jsonl"), "utf-8").trim().split("\n");
  assert.equal(lines.length, 2);
  assert.deepEqual(JSON.parse(lines[0]), { runId: "run_test", ...event });
  assert.equal(JSON.parse(lines[1]).executionId, "exec_2");
});
