import { ComprehendClient, DetectSentimentCommand, LanguageCode } from "@aws-sdk/client-comprehend";
import { CollaboratorError } from "./errors";
import { SentimentDetector, SentimentResult } from "./types";

interface ComprehendClientLike {
  send(
    command: DetectSentimentCommand,
    options?: { abortSignal?: AbortSignal },
  ): Promise<{
    Sentiment?: string;
    SentimentScore?: { Positive?: number; Negative?: number; Neutral?: number; Mixed?: number };
  }>;
}

export interface ComprehendSentimentDetectorOptions {
  region?: string;
  client?: ComprehendClientLike;
}

const LANGUAGE_CODES: readonly string[] = Object.values(LanguageCode);

function isLanguageCode(value: string): value is LanguageCode {
  return LANGUAGE_CODES.includes(value);
}

export class ComprehendSentimentDetector implements SentimentDetector {
  private readonly client: ComprehendClientLike;

  constructor(options: ComprehendSentimentDetectorOptions = {}) {
    this.client = options.client ?? new ComprehendClient(options.region ? { region: options.region } : {});
  }

  async detectSentiment(text: string, languageCode: string, signal?: AbortSignal): Promise<SentimentResult> {
    if (!isLanguageCode(languageCode)) {
      throw new CollaboratorError(`Unsupported language code for sentiment detection: ${languageCode}`, false);
    }

    const response = await this.client.send(new DetectSentimentCommand({ Text: text, LanguageCode: languageCode }), {
      abortSignal: signal,
    });

    if (!response.Sentiment) {
      throw new CollaboratorError("Sentiment response did not include a label", true);
    }

    const score = response.SentimentScore ?? {};
    return {
      label: response.Sentiment,
      scores: {
        Positive: score.Positive ?? 0,
        Negative: score.Negative ?? 0,
        Neutral: score.Neutral ?? 0,
        Mixed: score.Mixed ?? 0,
      },
    };
  }
}
