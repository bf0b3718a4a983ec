import test, { after } from "node:test";
import assert from "node:assert/strict";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, loadConfig } from "./loadConfig";

const dir = fs.mkdtempSync(path.join(os.tmpdir(), "docpipe-config-"));

after(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

function writeConfig(name: string, content: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(content), "utf-8");
  return filePath;
}

test("defaults apply when there is no file and no environment", () => {
  assert.deepEqual(loadConfig(undefined, {}), DEFAULT_CONFIG);
});

test("file values merge over defaults, nested sections included", () => {
  const configPath = writeConfig("merge.json", {
    storeMode: "memory",
    resultPrefix: "out/",
    stageDefaults: { maxAttempts: 5 },
    stageOverrides: { analysis: { timeoutMs: 60_000 } },
    outputDirs: { objects: "tmp/objects" },
    ignoreKeyPrefixes: ["archive/"],
  });

  const config = loadConfig(configPath, {});

  assert.equal(config.storeMode, "memory");
  assert.equal(config.resultPrefix, "out/");
  assert.deepEqual(config.stageDefaults, { maxAttempts: 5, backoffBaseMs: 1_000, maxBackoffMs: 10_000, timeoutMs: 300_000 });
  assert.deepEqual(config.stageOverrides, { analysis: { timeoutMs: 60_000 } });
  assert.deepEqual(config.outputDirs, { manifests: "data/manifests", objects: "tmp/objects" });
  assert.deepEqual(config.ignoreKeyPrefixes, ["archive/"]);
});

test("environment overrides the file", () => {
  const configPath = writeConfig("env.json", { storeMode: "memory", leaseMinutes: 5 });

  const config = loadConfig(configPath, {
    STORE_MODE: "sqlite",
    SENTIMENT_MODE: "http",
    STAGE_MAX_ATTEMPTS: "7",
    IGNORE_HTTPS_ERRORS: "yes",
    IGNORE_KEY_PREFIXES: "tmp/, ,drafts/",
    TRIGGER_QUEUE_URL: "https://sqs.local/123/triggers",
  });

  assert.equal(config.storeMode, "sqlite");
  assert.equal(config.sentimentMode, "http");
  assert.equal(config.stageDefaults.maxAttempts, 7);
  assert.equal(config.ignoreHttpsErrors, true);
  assert.deepEqual(config.ignoreKeyPrefixes, ["tmp/", "drafts/"]);
  assert.equal(config.triggerQueueUrl, "https://sqs.local/123/triggers");
  assert.equal(config.leaseMinutes, 5);
});

test("unparseable environment values fall back", () => {
  const config = loadConfig(undefined, {
    STORE_MODE: "postgres",
    LEASE_MINUTES: "soon",
    IGNORE_HTTPS_ERRORS: "maybe",
    TEXT_DETECTOR_MODE: "tesseract",
  });

  assert.equal(config.storeMode, "sqlite");
  assert.equal(config.leaseMinutes, 10);
  assert.equal(config.ignoreHttpsErrors, false);
  assert.equal(config.textDetectorMode, "textract");
});

test("a missing config file is an error", () => {
  assert.throws(() => loadConfig(path.join(dir, "absent.json"), {}), /Config file not found/);
});
