export {
  DrivingSceneAnalyzer,
  defaultImageId,
} from './analyzer';
export type {
  AnalyzeImagesOptions,
  AnalyzeOptions,
  AnalyzeSceneOptions,
  DrivingSceneAnalyzerOptions,
  ImageAnalysisResult,
  ImageInput,
  PredictOptions,
  SceneSamplingOptions,
} from './analyzer';
export { assembleOutput } from './assembler';
export type { OutputParts } from './assembler';
export {
  BBOX_LIMITS,
  MILLIRANGE_SCALE,
  SCENE_ANALYZER,
  SCENE_SAMPLING,
} from './config/constants';
export {
  CoordinateSpaceError,
  IncompleteOutputError,
  InvalidConfidenceError,
  InvalidEnumValueError,
  MalformedResponseError,
  ModelInvocationError,
  ModelOutputError,
  ResponseParsingError,
  SceneAnalysisError,
} from './errors';
export type {
  ModelOutputErrorKind,
  ResponseGrammar,
  SubQuery,
} from './errors';
export { CoordinateNormalizer } from './geometry';
export type { RescaleResult } from './geometry';
export {
  LineResponseParser,
  MultiCallResponseParser,
  PredictionJsonParser,
  PredictionResponseParser,
  SceneJsonParser,
} from './parsers';
export { DEFAULT_DRIVING_PROMPTS, resolvePrompts } from './prompts';
export type { DrivingPromptOverrides, DrivingPrompts } from './prompts';
export {
  boxHeight,
  boxWidth,
  createBoundingBox,
  createDetectedObject,
  createDirection,
  createPrediction,
  createSceneContext,
} from './records';
export type { DetectedObjectInit } from './records';
export type {
  ImageSize,
  MultiCallResponses,
  PredictionGrammar,
  PredictionResponse,
  PredictionResult,
  SceneParseResult,
} from './types';
export {
  DEFAULT_BBOX_LIMITS,
  normalizeAngle,
  parseConfidence,
  toMillirange,
  validateActionType,
  validateNormalizedBBox,
  validateObjectType,
  validateRoadType,
  validateTimeOfDay,
  validateTrafficLightState,
  validateWeatherCondition,
} from './validators';
export type { BBoxLimits, BBoxValidationResult } from './validators';
