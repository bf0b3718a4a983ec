import { StageContext, StageExecutor, StageResult, success } from "../pipeline/stage";
import { StagePayload } from "../types";

export function titleFromKey(key: string): string {
  const segments = key.split("/");
  return segments[segments.length - 1];
}

export class MetadataStage implements StageExecutor {
  readonly name = "metadata";

  async execute(payload: StagePayload, context: StageContext): Promise<StageResult> {
    const { container, key } = context.documentRef;
    return success({
      ...payload,
      metadata: {
        title: titleFromKey(key),
        source: container,
      },
    });
  }
}
