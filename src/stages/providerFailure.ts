import { fatal, retryable, StageResult } from "../pipeline/stage";
import { classifyProviderError, describeError } from "../providers/errors";

export function providerFailure(action: string, error: unknown): StageResult {
  const reason = `${action}: ${describeError(error)}`;
  return classifyProviderError(error) === "retryable" ? retryable(reason) : fatal(reason);
}
