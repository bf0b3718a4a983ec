import test, { after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { CommandContext } from "../core/commands";
import { createDocumentOrchestrator } from "../core/orchestratorFactory";
import { MetricsRegistry } from "../observability";
import { InvalidReplayError } from "../pipeline/errors";
import { CollaboratorError } from "../providers/errors";
import { InMemoryStore } from "../store";
import {
  createTestConfig,
  createTestLogger,
  FakeObjectStore,
  FakeSentimentDetector,
  FakeTextDetector,
} from "../testing/fakes";
import { executeCommand, getHelpText, parseCliArgs, ParsedCliArgs } from "./index";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docpipe-cli-"));

after(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function createContext() {
  const config = createTestConfig();
  const store = new InMemoryStore();
  const metrics = new MetricsRegistry();
  const { logger } = createTestLogger("cli");
  const objects = new FakeObjectStore();
  const sentiment = new FakeSentimentDetector();
  const orchestrator = createDocumentOrchestrator(config, {
    store,
    logger,
    metrics,
    workerId: "worker_test",
    providers: { objects, text: new FakeTextDetector(), sentiment },
  });
  const context: CommandContext = { runId: "run_test", config, store, logger, metrics, orchestrator };
  return { context, objects, sentiment };
}

function parsed(argv: string[]): ParsedCliArgs {
  const result = parseCliArgs(argv);
  assert.notEqual(result, "help");
  if (result === "help") {
    throw new Error("unexpected help");
  }
  return result;
}

test("parses commands and their options", () => {
  const args = parsed(["replay", "--container", "docs", "--key", "a.pdf", "--from-stage", "analysis", "--config", "cfg.json"]);
  assert.equal(args.command, "replay");
  assert.equal(args.container, "docs");
  assert.equal(args.key, "a.pdf");
  assert.equal(args.fromStage, "analysis");
  assert.equal(args.configPath, "cfg.json");

  assert.equal(parsed(["resume", "--limit", "25"]).limit, 25);
  assert.equal(parsed(["resume", "--limit", "lots"]).limit, undefined);
  assert.equal(parsed(["listen", "--iterations", "--config", "cfg.json"]).iterations, undefined);
});

test("help is shown for -h and unknown commands", () => {
  assert.equal(parseCliArgs(["start", "--help"]), "help");
  assert.equal(parseCliArgs(["ingest"]), "help");
  assert.equal(parseCliArgs([]), "help");
  assert.match(getHelpText(), /^Usage:\n {2}docpipe <command> \[options\]/);
});

test("start runs the document to completion and status finds it", async () => {
  const { context, objects } = createContext();

  assert.equal(await executeCommand(context, parsed(["start", "--container", "docs", "--key", "a.pdf"])), 0);
  assert.ok(objects.objects.has("docs/results/a.pdf.json"));

  assert.equal(await executeCommand(context, parsed(["status", "--container", "docs", "--key", "a.pdf"])), 0);
  assert.equal(await executeCommand(context, parsed(["status", "--container", "docs", "--key", "missing.pdf"])), 1);
  assert.equal(await executeCommand(context, parsed(["status"])), 0);
  assert.deepEqual(await context.store.getStats(), { totalExecutions: 1, pending: 0, running: 0, succeeded: 1, failed: 0 });
});

test("a failed execution gives exit code 1", async () => {
  const { context, sentiment } = createContext();
  sentiment.alwaysFail = new CollaboratorError("AccessDenied", false);

  assert.equal(await executeCommand(context, parsed(["start", "--container", "docs", "--key", "a.pdf"])), 1);
});

test("replay re-runs a finished document and rejects unknown stages", async () => {
  const { context } = createContext();
  await executeCommand(context, parsed(["start", "--container", "docs", "--key", "a.pdf"]));

  assert.equal(
    await executeCommand(context, parsed(["replay", "--container", "docs", "--key", "a.pdf", "--from-stage", "analysis"])),
    0,
  );
  const stats = await context.store.getStats();
  assert.equal(stats.succeeded, 2);

  await assert.rejects(
    executeCommand(context, parsed(["replay", "--container", "docs", "--key", "a.pdf", "--from-stage", "ocr"])),
    InvalidReplayError,
  );
});

test("handle-event starts documents from a storage event file and skips result objects", async () => {
  const { context, objects } = createContext();
  const eventPath = path.join(dir, "event.json");
  fs.writeFileSync(
    eventPath,
    JSON.stringify({
      Records: [
        { eventName: "ObjectCreated:Put", s3: { bucket: { name: "docs" }, object: { key: "reports/q1.pdf" } } },
        { eventName: "ObjectCreated:Put", s3: { bucket: { name: "docs" }, object: { key: "results/old.pdf.json" } } },
      ],
    }),
    "utf-8",
  );

  assert.equal(await executeCommand(context, parsed(["handle-event", "--event", eventPath])), 0);
  assert.deepEqual([...objects.objects.keys()], ["docs/results/reports/q1.pdf.json"]);
  assert.equal(context.metrics.getCounter("triggers_started"), 1);
});

test("commands reject missing arguments", async () => {
  const { context } = createContext();

  await assert.rejects(executeCommand(context, parsed(["start", "--container", "docs"])), /start needs both --container and --key/);
  await assert.rejects(executeCommand(context, parsed(["replay"])), /replay needs --container and --key/);
  await assert.rejects(executeCommand(context, parsed(["handle-event"])), /handle-event needs --event <file>/);
  await assert.rejects(executeCommand(context, parsed(["listen"])), /listen requires a trigger queue URL/);
});
