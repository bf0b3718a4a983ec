import { PDFParse } from "pdf-parse";
import { DocumentRef } from "../types";
import { CollaboratorError, describeError } from "./errors";
import { ObjectStore, TextDetector } from "./types";

export type PdfTextParser = (data: Buffer) => Promise<string>;

async function parseWithPdfParse(data: Buffer): Promise<string> {
  const parser = new PDFParse({ data });
  try {
    const parsed = await parser.getText();
    return parsed.text ?? "";
  } finally {
    await parser.destroy();
  }
}

export function splitLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Local replacement for the OCR service: reads the object bytes and extracts the
 * embedded text layer of a PDF. Parse failures are treated as malformed documents.
 */
export class PdfParseTextDetector implements TextDetector {
  private readonly objects: ObjectStore;
  private readonly parse: PdfTextParser;

  constructor(objects: ObjectStore, parse: PdfTextParser = parseWithPdfParse) {
    this.objects = objects;
    this.parse = parse;
  }

  async detectText(ref: DocumentRef, signal?: AbortSignal): Promise<string[]> {
    const data = await this.objects.getObject(ref, signal);

    let text: string;
    try {
      text = await this.parse(data);
    } catch (error) {
      throw new CollaboratorError(`Unable to parse ${ref.container}/${ref.key}: ${describeError(error)}`, false, {
        cause: error,
      });
    }
    return splitLines(text);
  }
}
