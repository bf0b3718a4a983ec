import crypto from "node:crypto";
import { DocumentRef } from "../types";
import { InvalidDocumentRefError } from "./errors";

export function assertDocumentRef(ref: DocumentRef): void {
  if (typeof ref.container !== "string" || ref.container.length === 0) {
    throw new InvalidDocumentRefError("Document reference needs a non-empty container");
  }
  if (typeof ref.key !== "string" || ref.key.length === 0) {
    throw new InvalidDocumentRefError("Document reference needs a non-empty key");
  }
}

/** JSON array encoding: keys may hold any character, newlines included. */
export function documentKey(ref: DocumentRef): string {
  return JSON.stringify([ref.container, ref.key]);
}

/**
 * Generation 0 is the first execution of a document; each replay bumps the generation,
 * so duplicate triggers always land on the same id.
 */
export function createExecutionId(ref: DocumentRef, generation = 0): string {
  const material = JSON.stringify([ref.container, ref.key, generation]);
  return `exec_${crypto.createHash("sha256").update(material).digest("hex").slice(0, 32)}`;
}
