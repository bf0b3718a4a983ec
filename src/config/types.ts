export interface StageSettings {
  maxAttempts: number;
  backoffBaseMs: number;
  maxBackoffMs: number;
  timeoutMs: number;
}

export interface OutputDirs {
  manifests: string;
  objects: string;
}

export interface AppConfig {
  storeMode: "sqlite" | "memory";
  storePath: string;
  objectStoreMode: "s3" | "local";
  textDetectorMode: "textract" | "pdf_parse";
  sentimentMode: "comprehend" | "http";
  sentimentHttpBaseUrl: string;
  sentimentHttpToken?: string;
  sentimentHttpTimeoutMs: number;
  ignoreHttpsErrors: boolean;
  awsRegion: string;
  languageCode: string;
  maxAnalysisChars: number;
  resultPrefix: string;
  resultContainer?: string;
  stageDefaults: StageSettings;
  stageOverrides: Record<string, Partial<StageSettings>>;
  maxConcurrentExecutions: number;
  leaseMinutes: number;
  storeRetryAttempts: number;
  storeRetryDelayMs: number;
  triggerQueueUrl?: string;
  triggerWaitSeconds: number;
  triggerBatchSize: number;
  ignoreKeyPrefixes: string[];
  outputDirs: OutputDirs;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "stageDefaults">> & {
  outputDirs?: Partial<OutputDirs>;
  stageDefaults?: Partial<StageSettings>;
};
