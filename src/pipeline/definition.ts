import { AppConfig } from "../config";
import { PipelineDefinitionError } from "./errors";

export interface StageSpec {
  readonly name: string;
  readonly maxAttempts: number;
  readonly backoffBaseMs: number;
  readonly maxBackoffMs: number;
  readonly timeoutMs: number;
}

export const DOCUMENT_STAGE_NAMES = ["metadata", "text_extraction", "analysis", "persistence"] as const;

export type DocumentStageName = (typeof DOCUMENT_STAGE_NAMES)[number];

function validateStage(spec: StageSpec, index: number): void {
  if (typeof spec.name !== "string" || spec.name.trim().length === 0) {
    throw new PipelineDefinitionError(`Stage at index ${index} has an empty name`);
  }
  if (!Number.isInteger(spec.maxAttempts) || spec.maxAttempts < 1) {
    throw new PipelineDefinitionError(`Stage ${spec.name}: maxAttempts must be an integer >= 1`);
  }
  if (!Number.isFinite(spec.backoffBaseMs) || spec.backoffBaseMs < 0) {
    throw new PipelineDefinitionError(`Stage ${spec.name}: backoffBaseMs must be >= 0`);
  }
  if (!Number.isFinite(spec.maxBackoffMs) || spec.maxBackoffMs < 0) {
    throw new PipelineDefinitionError(`Stage ${spec.name}: maxBackoffMs must be >= 0`);
  }
  if (!Number.isFinite(spec.timeoutMs) || spec.timeoutMs <= 0) {
    throw new PipelineDefinitionError(`Stage ${spec.name}: timeoutMs must be > 0`);
  }
}

/**
 * Ordered, immutable list of stages shared by every execution.
 */
export class PipelineDefinition implements Iterable<StageSpec> {
  private readonly stages: readonly StageSpec[];
  private readonly indexByName: ReadonlyMap<string, number>;

  constructor(stages: readonly StageSpec[]) {
    if (stages.length === 0) {
      throw new PipelineDefinitionError("Pipeline definition needs at least one stage");
    }

    const indexByName = new Map<string, number>();
    const frozen: StageSpec[] = [];
    stages.forEach((spec, index) => {
      validateStage(spec, index);
      if (indexByName.has(spec.name)) {
        throw new PipelineDefinitionError(`Duplicate stage name: ${spec.name}`);
      }
      indexByName.set(spec.name, index);
      frozen.push(Object.freeze({ ...spec }));
    });

    this.stages = Object.freeze(frozen);
    this.indexByName = indexByName;
  }

  get length(): number {
    return this.stages.length;
  }

  stageAt(index: number): StageSpec | undefined {
    return this.stages[index];
  }

  get(name: string): StageSpec | undefined {
    const index = this.indexByName.get(name);
    return index === undefined ? undefined : this.stages[index];
  }

  indexOf(name: string): number {
    return this.indexByName.get(name) ?? -1;
  }

  names(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  [Symbol.iterator](): Iterator<StageSpec> {
    return this.stages[Symbol.iterator]();
  }
}

export function computeBackoffMs(spec: StageSpec, attempt: number): number {
  const exponent = Math.max(attempt - 1, 0);
  return Math.min(spec.backoffBaseMs * 2 ** exponent, spec.maxBackoffMs);
}

export function createDocumentPipeline(config: AppConfig): PipelineDefinition {
  return new PipelineDefinition(
    DOCUMENT_STAGE_NAMES.map((name) => ({
      name,
      ...config.stageDefaults,
      ...(config.stageOverrides[name] ?? {}),
    })),
  );
}
