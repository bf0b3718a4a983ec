import { StageContext, StageExecutor, StageResult, success } from "../pipeline/stage";
import { TextDetector } from "../providers/types";
import { StagePayload } from "../types";
import { providerFailure } from "./providerFailure";

export class TextExtractionStage implements StageExecutor {
  readonly name = "text_extraction";
  private readonly detector: TextDetector;

  constructor(detector: TextDetector) {
    this.detector = detector;
  }

  async execute(payload: StagePayload, context: StageContext): Promise<StageResult> {
    let lines: string[];
    try {
      lines = await this.detector.detectText(context.documentRef, context.signal);
    } catch (error) {
      return providerFailure("Text detection failed", error);
    }

    context.logger.debug("text_detected", {
      executionId: context.executionId,
      stage: this.name,
      lines: lines.length,
    });
    return success({ ...payload, text: lines.join("\n") });
  }
}
