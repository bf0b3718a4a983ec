import { DocumentRef } from "../types";

export interface TextDetector {
  /** Detected lines in reading order. */
  detectText(ref: DocumentRef, signal?: AbortSignal): Promise<string[]>;
}

export interface SentimentResult {
  label: string;
  scores: Record<string, number>;
}

export interface SentimentDetector {
  detectSentiment(text: string, languageCode: string, signal?: AbortSignal): Promise<SentimentResult>;
}

export interface ObjectStore {
  getObject(ref: DocumentRef, signal?: AbortSignal): Promise<Buffer>;
  /** Returns the URI of the written object. */
  putObject(ref: DocumentRef, body: string, contentType: string, signal?: AbortSignal): Promise<string>;
  deleteObject(ref: DocumentRef): Promise<void>;
}
