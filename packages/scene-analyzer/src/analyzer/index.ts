export { DrivingSceneAnalyzer, defaultImageId } from './driving-scene-analyzer';
export type {
  AnalyzeImagesOptions,
  AnalyzeOptions,
  AnalyzeSceneOptions,
  DrivingSceneAnalyzerOptions,
  ImageAnalysisResult,
  ImageInput,
  PredictOptions,
  SceneSamplingOptions,
} from './driving-scene-analyzer';
