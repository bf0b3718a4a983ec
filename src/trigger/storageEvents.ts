import { documentKey } from "../pipeline/executionId";
import { DocumentRef, isJsonObject, JsonValue } from "../types";

export interface StorageEventFilter {
  /** Keys under these prefixes never start an execution. */
  ignoreKeyPrefixes: string[];
}

export class InvalidTriggerEventError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidTriggerEventError";
  }
}

/** S3 notification keys are form-encoded: `+` is a space. */
export function decodeObjectKey(raw: string): string {
  const spaced = raw.replace(/\+/g, " ");
  try {
    return decodeURIComponent(spaced);
  } catch {
    return spaced;
  }
}

function readPath(value: JsonValue | undefined, ...path: string[]): JsonValue | undefined {
  let current = value;
  for (const segment of path) {
    if (!isJsonObject(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function refsFromRecords(records: JsonValue[]): DocumentRef[] {
  const refs: DocumentRef[] = [];
  for (const record of records) {
    const eventName = readPath(record, "eventName");
    if (typeof eventName !== "string" || !eventName.startsWith("ObjectCreated:")) {
      continue;
    }
    const bucket = readPath(record, "s3", "bucket", "name");
    const key = readPath(record, "s3", "object", "key");
    if (typeof bucket !== "string" || typeof key !== "string") {
      throw new InvalidTriggerEventError("S3 record is missing bucket name or object key");
    }
    refs.push({ container: bucket, key: decodeObjectKey(key) });
  }
  return refs;
}

function extractRefs(body: JsonValue): DocumentRef[] {
  if (!isJsonObject(body)) {
    throw new InvalidTriggerEventError("Trigger event is not a JSON object");
  }

  if (body.Event === "s3:TestEvent") {
    return [];
  }

  // S3 -> SNS -> SQS deliveries wrap the notification in an SNS envelope
  if (body.Type === "Notification" && typeof body.Message === "string") {
    return extractRefs(parseJsonBody(body.Message));
  }

  if (Array.isArray(body.Records)) {
    return refsFromRecords(body.Records);
  }

  const container = readPath(body, "documentRef", "container");
  const key = readPath(body, "documentRef", "key");
  if (typeof container === "string" && typeof key === "string") {
    return [{ container, key }];
  }

  throw new InvalidTriggerEventError("Trigger event has neither Records nor documentRef");
}

function parseJsonBody(raw: string): JsonValue {
  try {
    const parsed: JsonValue = JSON.parse(raw);
    return parsed;
  } catch (error) {
    throw new InvalidTriggerEventError("Trigger event is not valid JSON", { cause: error });
  }
}

/**
 * Turns a storage notification (raw JSON text or parsed) into the document
 * references it announces, dropping ignored keys and duplicates.
 */
export function parseStorageEvent(body: string | JsonValue, filter: StorageEventFilter): DocumentRef[] {
  const parsed = typeof body === "string" ? parseJsonBody(body) : body;
  const seen = new Set<string>();
  const refs: DocumentRef[] = [];

  for (const ref of extractRefs(parsed)) {
    if (ref.container.length === 0 || ref.key.length === 0) {
      continue;
    }
    if (filter.ignoreKeyPrefixes.some((prefix) => prefix.length > 0 && ref.key.startsWith(prefix))) {
      continue;
    }
    const dedupeKey = documentKey(ref);
    if (seen.has(dedupeKey)) {
      continue;
    }
    seen.add(dedupeKey);
    refs.push(ref);
  }
  return refs;
}
