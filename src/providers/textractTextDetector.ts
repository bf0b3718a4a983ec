import { DetectDocumentTextCommand, TextractClient } from "@aws-sdk/client-textract";
import { DocumentRef } from "../types";
import { TextDetector } from "./types";

interface TextractClientLike {
  send(
    command: DetectDocumentTextCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<{ Blocks?: Array<{ BlockType?: string; Text?: string }> }>;
}

export interface TextractTextDetectorOptions {
  region?: string;
  client?: TextractClientLike;
}

export class TextractTextDetector implements TextDetector {
  private readonly client: TextractClientLike;

  constructor(options: TextractTextDetectorOptions = {}) {
    this.client = options.client ?? new TextractClient(options.region ? { region: options.region } : {});
  }

  async detectText(ref: DocumentRef, signal?: AbortSignal): Promise<string[]> {
    const response = await this.client.send(
      new DetectDocumentTextCommand({
        Document: { S3Object: { Bucket: ref.container, Name: ref.key } },
      }),
      { abortSignal: signal },
    );

    const lines: string[] = [];
    for (const block of response.Blocks ?? []) {
      if (block.BlockType === "LINE" && typeof block.Text === "string") {
        lines.push(block.Text);
      }
    }
    return lines;
  }
}
