export type FailureClass = "retryable" | "fatal";

/**
 * Error raised by a collaborator adapter that already knows whether a retry can help.
 */
export class CollaboratorError extends Error {
  readonly retryable: boolean;

  constructor(message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CollaboratorError";
    this.retryable = retryable;
  }
}

const RETRYABLE_NAMES = new Set([
  "ThrottlingException",
  "Throttling",
  "TooManyRequestsException",
  "ProvisionedThroughputExceededException",
  "LimitExceededException",
  "InternalServerError",
  "InternalServerException",
  "InternalError",
  "ServiceUnavailable",
  "ServiceUnavailableException",
  "RequestTimeout",
  "RequestTimeoutException",
  "TimeoutError",
  "SlowDown",
  "AbortError",
]);

const FATAL_NAMES = new Set([
  "InvalidParameterException",
  "InvalidRequestException",
  "ValidationException",
  "UnsupportedDocumentException",
  "BadDocumentException",
  "DocumentTooLargeException",
  "InvalidS3ObjectException",
  "TextSizeLimitExceededException",
  "UnsupportedLanguageException",
  "AccessDeniedException",
  "AccessDenied",
  "NoSuchKey",
  "NoSuchBucket",
  "NotFound",
]);

const RETRYABLE_NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "ENOTFOUND",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
]);

const FATAL_FS_CODES = new Set(["ENOENT", "EISDIR", "EACCES", "EPERM"]);

function readStringProperty(value: object, property: string): string | undefined {
  const candidate: unknown = Reflect.get(value, property);
  return typeof candidate === "string" ? candidate : undefined;
}

function readStatusCode(value: object): number | undefined {
  const metadata: unknown = Reflect.get(value, "$metadata");
  if (typeof metadata !== "object" || metadata === null) {
    return undefined;
  }
  const status: unknown = Reflect.get(metadata, "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

/**
 * Maps an error thrown by an AWS SDK client, undici or the filesystem onto the
 * retryable/fatal split used by stage outcomes.
 */
export function classifyProviderError(error: unknown): FailureClass {
  if (error instanceof CollaboratorError) {
    return error.retryable ? "retryable" : "fatal";
  }
  if (typeof error !== "object" || error === null) {
    return "fatal";
  }

  if (Reflect.get(error, "$retryable")) {
    return "retryable";
  }

  const name = readStringProperty(error, "name");
  if (name && RETRYABLE_NAMES.has(name)) {
    return "retryable";
  }
  if (name && FATAL_NAMES.has(name)) {
    return "fatal";
  }

  const code = readStringProperty(error, "code");
  const cause: unknown = Reflect.get(error, "cause");
  const causeCode = typeof cause === "object" && cause !== null ? readStringProperty(cause, "code") : undefined;
  if ((code && RETRYABLE_NETWORK_CODES.has(code)) || (causeCode && RETRYABLE_NETWORK_CODES.has(causeCode))) {
    return "retryable";
  }
  if (code && FATAL_FS_CODES.has(code)) {
    return "fatal";
  }

  const status = readStatusCode(error);
  if (status !== undefined) {
    return status === 408 || status === 429 || status >= 500 ? "retryable" : "fatal";
  }

  // fetch failures surface as a bare TypeError("fetch failed") with the socket error as cause
  if (error instanceof TypeError && error.message === "fetch failed") {
    return "retryable";
  }

  return "fatal";
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name && error.name !== "Error" ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}
