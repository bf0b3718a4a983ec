import fs from "node:fs";
import path from "node:path";
import { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  storeMode: "sqlite",
  storePath: "data/executions.sqlite",
  objectStoreMode: "s3",
  textDetectorMode: "textract",
  sentimentMode: "comprehend",
  sentimentHttpBaseUrl: "http://127.0.0.1:8082",
  sentimentHttpToken: undefined,
  sentimentHttpTimeoutMs: 15_000,
  ignoreHttpsErrors: false,
  awsRegion: "us-east-1",
  languageCode: "en",
  maxAnalysisChars: 5_000,
  resultPrefix: "results/",
  resultContainer: undefined,
  stageDefaults: {
    maxAttempts: 3,
    backoffBaseMs: 1_000,
    maxBackoffMs: 10_000,
    timeoutMs: 300_000,
  },
  stageOverrides: {},
  maxConcurrentExecutions: 4,
  leaseMinutes: 10,
  storeRetryAttempts: 3,
  storeRetryDelayMs: 500,
  triggerQueueUrl: undefined,
  triggerWaitSeconds: 20,
  triggerBatchSize: 10,
  ignoreKeyPrefixes: [],
  outputDirs: {
    manifests: "data/manifests",
    objects: "data/objects",
  },
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = JSON.parse(raw) as ConfigOverrides;
  return parsed ?? {};
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined, fallback: string[]): string[] {
  if (value === undefined) {
    return fallback;
  }
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function pickEnum<T extends string>(value: string | undefined, allowed: readonly T[], fallback: T): T {
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    stageDefaults: {
      ...DEFAULT_CONFIG.stageDefaults,
      ...(fileConfig.stageDefaults ?? {}),
    },
    stageOverrides: {
      ...DEFAULT_CONFIG.stageOverrides,
      ...(fileConfig.stageOverrides ?? {}),
    },
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  return {
    ...merged,
    storeMode: pickEnum(env.STORE_MODE, ["sqlite", "memory"], merged.storeMode),
    storePath: env.STORE_PATH ?? merged.storePath,
    objectStoreMode: pickEnum(env.OBJECT_STORE_MODE, ["s3", "local"], merged.objectStoreMode),
    textDetectorMode: pickEnum(env.TEXT_DETECTOR_MODE, ["textract", "pdf_parse"], merged.textDetectorMode),
    sentimentMode: pickEnum(env.SENTIMENT_MODE, ["comprehend", "http"], merged.sentimentMode),
    sentimentHttpBaseUrl: env.SENTIMENT_HTTP_BASE_URL ?? merged.sentimentHttpBaseUrl,
    sentimentHttpToken: env.SENTIMENT_HTTP_TOKEN ?? merged.sentimentHttpToken,
    sentimentHttpTimeoutMs: toInt(env.SENTIMENT_HTTP_TIMEOUT_MS, merged.sentimentHttpTimeoutMs),
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    awsRegion: env.AWS_REGION ?? merged.awsRegion,
    languageCode: env.LANGUAGE_CODE ?? merged.languageCode,
    maxAnalysisChars: toInt(env.MAX_ANALYSIS_CHARS, merged.maxAnalysisChars),
    resultPrefix: env.RESULT_PREFIX ?? merged.resultPrefix,
    resultContainer: env.RESULT_CONTAINER ?? merged.resultContainer,
    stageDefaults: {
      maxAttempts: toInt(env.STAGE_MAX_ATTEMPTS, merged.stageDefaults.maxAttempts),
      backoffBaseMs: toInt(env.STAGE_BACKOFF_BASE_MS, merged.stageDefaults.backoffBaseMs),
      maxBackoffMs: toInt(env.STAGE_MAX_BACKOFF_MS, merged.stageDefaults.maxBackoffMs),
      timeoutMs: toInt(env.STAGE_TIMEOUT_MS, merged.stageDefaults.timeoutMs),
    },
    maxConcurrentExecutions: toInt(env.MAX_CONCURRENT_EXECUTIONS, merged.maxConcurrentExecutions),
    leaseMinutes: toInt(env.LEASE_MINUTES, merged.leaseMinutes),
    storeRetryAttempts: toInt(env.STORE_RETRY_ATTEMPTS, merged.storeRetryAttempts),
    storeRetryDelayMs: toInt(env.STORE_RETRY_DELAY_MS, merged.storeRetryDelayMs),
    triggerQueueUrl: env.TRIGGER_QUEUE_URL ?? merged.triggerQueueUrl,
    triggerWaitSeconds: toInt(env.TRIGGER_WAIT_SECONDS, merged.triggerWaitSeconds),
    triggerBatchSize: toInt(env.TRIGGER_BATCH_SIZE, merged.triggerBatchSize),
    ignoreKeyPrefixes: toList(env.IGNORE_KEY_PREFIXES, merged.ignoreKeyPrefixes),
    outputDirs: {
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
      objects: env.OUTPUT_OBJECTS_DIR ?? merged.outputDirs.objects,
    },
  };
}

export { DEFAULT_CONFIG };
