import { AppConfig } from "../config";
import { StageRegistry } from "../pipeline/stage";
import { Providers } from "../providers";
import { AnalysisStage } from "./analysisStage";
import { MetadataStage } from "./metadataStage";
import { PersistenceStage } from "./persistenceStage";
import { TextExtractionStage } from "./textExtractionStage";

export function createStageRegistry(config: AppConfig, providers: Providers): StageRegistry {
  return new StageRegistry([
    new MetadataStage(),
    new TextExtractionStage(providers.text),
    new AnalysisStage(providers.sentiment, {
      languageCode: config.languageCode,
      maxChars: config.maxAnalysisChars,
    }),
    new PersistenceStage(providers.objects, {
      resultPrefix: config.resultPrefix,
      resultContainer: config.resultContainer,
    }),
  ]);
}

export { AnalysisStage, truncateText } from "./analysisStage";
export { MetadataStage, titleFromKey } from "./metadataStage";
export { PersistenceStage } from "./persistenceStage";
export { TextExtractionStage } from "./textExtractionStage";
