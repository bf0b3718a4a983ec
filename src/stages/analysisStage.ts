import { fatal, StageContext, StageExecutor, StageResult, success } from "../pipeline/stage";
import { SentimentDetector } from "../providers/types";
import { JsonObject, StagePayload } from "../types";
import { providerFailure } from "./providerFailure";

export interface AnalysisStageOptions {
  languageCode: string;
  maxChars: number;
}

/** Truncates by code points so a surrogate pair is never split. */
export function truncateText(text: string, maxChars: number): { text: string; truncated: boolean } {
  const codePoints = Array.from(text);
  if (codePoints.length <= maxChars) {
    return { text, truncated: false };
  }
  return { text: codePoints.slice(0, maxChars).join(""), truncated: true };
}

export class AnalysisStage implements StageExecutor {
  readonly name = "analysis";
  private readonly detector: SentimentDetector;
  private readonly options: AnalysisStageOptions;

  constructor(detector: SentimentDetector, options: AnalysisStageOptions) {
    this.detector = detector;
    this.options = options;
  }

  async execute(payload: StagePayload, context: StageContext): Promise<StageResult> {
    const text = payload.text;
    if (typeof text !== "string") {
      return fatal("Payload has no extracted text to analyse");
    }

    if (text.length === 0) {
      return success({ ...payload, analysis: { sentiment: null, scores: {} } });
    }

    const input = truncateText(text, this.options.maxChars);
    if (input.truncated) {
      context.logger.info("analysis_text_truncated", {
        executionId: context.executionId,
        stage: this.name,
        maxChars: this.options.maxChars,
      });
    }

    try {
      const result = await this.detector.detectSentiment(input.text, this.options.languageCode, context.signal);
      const scores: JsonObject = { ...result.scores };
      return success({
        ...payload,
        analysis: {
          sentiment: result.label,
          scores,
        },
      });
    } catch (error) {
      return providerFailure("Sentiment detection failed", error);
    }
  }
}
