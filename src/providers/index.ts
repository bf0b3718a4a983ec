import { AppConfig } from "../config";
import { ComprehendSentimentDetector } from "./comprehendSentimentDetector";
import { HttpSentimentDetector } from "./httpSentimentDetector";
import { LocalObjectStore } from "./localObjectStore";
import { PdfParseTextDetector } from "./pdfParseTextDetector";
import { S3ObjectStore } from "./s3ObjectStore";
import { TextractTextDetector } from "./textractTextDetector";
import { ObjectStore, SentimentDetector, TextDetector } from "./types";

export interface Providers {
  objects: ObjectStore;
  text: TextDetector;
  sentiment: SentimentDetector;
}

export function createProviders(config: AppConfig): Providers {
  const objects: ObjectStore =
    config.objectStoreMode === "local"
      ? new LocalObjectStore(config.outputDirs.objects)
      : new S3ObjectStore({ region: config.awsRegion });

  const text: TextDetector =
    config.textDetectorMode === "pdf_parse"
      ? new PdfParseTextDetector(objects)
      : new TextractTextDetector({ region: config.awsRegion });

  const sentiment: SentimentDetector =
    config.sentimentMode === "http"
      ? new HttpSentimentDetector({
          baseUrl: config.sentimentHttpBaseUrl,
          token: config.sentimentHttpToken,
          timeoutMs: config.sentimentHttpTimeoutMs,
          ignoreHttpsErrors: config.ignoreHttpsErrors,
        })
      : new ComprehendSentimentDetector({ region: config.awsRegion });

  return { objects, text, sentiment };
}

export { ComprehendSentimentDetector } from "./comprehendSentimentDetector";
export * from "./errors";
export { HttpSentimentDetector } from "./httpSentimentDetector";
export { LocalObjectStore } from "./localObjectStore";
export { PdfParseTextDetector } from "./pdfParseTextDetector";
export { S3ObjectStore } from "./s3ObjectStore";
export { TextractTextDetector } from "./textractTextDetector";
export * from "./types";
