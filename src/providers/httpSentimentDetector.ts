import { fetch } from "undici";
import { getFetchDispatcher } from "../core/fetch";
import { isJsonObject } from "../types";
import { CollaboratorError } from "./errors";
import { SentimentDetector, SentimentResult } from "./types";

interface HttpResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type SentimentFetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal },
) => Promise<HttpResponseLike>;

export interface HttpSentimentDetectorOptions {
  baseUrl: string;
  token?: string;
  timeoutMs?: number;
  ignoreHttpsErrors?: boolean;
  fetchFn?: SentimentFetchLike;
}

function isRetriableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export function parseSentimentResponse(raw: string): SentimentResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CollaboratorError("Sentiment service returned invalid JSON", false, { cause: error });
  }

  if (!isJsonObject(parsed) || typeof parsed.label !== "string" || !isJsonObject(parsed.scores)) {
    throw new CollaboratorError("Sentiment service response is missing label or scores", false);
  }

  const scores: Record<string, number> = {};
  for (const [label, value] of Object.entries(parsed.scores)) {
    if (typeof value === "number") {
      scores[label] = value;
    }
  }
  return { label: parsed.label, scores };
}

/**
 * Client for a self-hosted sentiment service: `POST <baseUrl>/sentiment` with
 * `{ text, languageCode }`, answering `{ label, scores }`.
 */
export class HttpSentimentDetector implements SentimentDetector {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: SentimentFetchLike;

  constructor(options: HttpSentimentDetectorOptions) {
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/sentiment`;
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 15_000;
    const dispatcher = getFetchDispatcher(options.ignoreHttpsErrors ?? false);
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, { ...init, dispatcher }));
  }

  async detectSentiment(text: string, languageCode: string, signal?: AbortSignal): Promise<SentimentResult> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    const forwardAbort = () => controller.abort();
    signal?.addEventListener("abort", forwardAbort, { once: true });

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    try {
      const response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify({ text, languageCode }),
        signal: controller.signal,
      });

      const body = await response.text();
      if (!response.ok) {
        throw new CollaboratorError(
          `Sentiment service responded ${response.status}: ${body}`,
          isRetriableStatus(response.status),
        );
      }
      return parseSentimentResponse(body);
    } finally {
      clearTimeout(timeout);
      signal?.removeEventListener("abort", forwardAbort);
    }
  }
}
