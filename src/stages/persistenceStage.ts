import { StageContext, StageExecutor, StageResult, success } from "../pipeline/stage";
import { ObjectStore } from "../providers/types";
import { DocumentRef, StagePayload } from "../types";
import { providerFailure } from "./providerFailure";

export interface PersistenceStageOptions {
  resultPrefix: string;
  resultContainer?: string;
}

export class PersistenceStage implements StageExecutor {
  readonly name = "persistence";
  private readonly objects: ObjectStore;
  private readonly options: PersistenceStageOptions;

  constructor(objects: ObjectStore, options: PersistenceStageOptions) {
    this.objects = objects;
    this.options = options;
  }

  resultRef(source: DocumentRef): DocumentRef {
    return {
      container: this.options.resultContainer ?? source.container,
      key: `${this.options.resultPrefix}${source.key}.json`,
    };
  }

  async execute(payload: StagePayload, context: StageContext): Promise<StageResult> {
    const target = this.resultRef(context.documentRef);
    try {
      const location = await this.objects.putObject(
        target,
        JSON.stringify(payload, null, 2),
        "application/json",
        context.signal,
      );
      return success({ ...payload, resultLocation: location });
    } catch (error) {
      return providerFailure("Result write failed", error);
    }
  }

  async compensate(_payload: StagePayload, context: StageContext): Promise<void> {
    const target = this.resultRef(context.documentRef);
    await this.objects.deleteObject(target);
    context.logger.info("result_object_removed", {
      executionId: context.executionId,
      stage: this.name,
      container: target.container,
      key: target.key,
    });
  }
}
