export { BaseResponseParser } from './base-response-parser';
export { LineResponseParser } from './line-response-parser';
export {
  MultiCallResponseParser,
  combineResponses,
} from './multi-call-response-parser';
export { PredictionJsonParser } from './prediction-json-parser';
export { PredictionResponseParser } from './prediction-response-parser';
export { SceneJsonParser } from './scene-json-parser';
export {
  predictionJsonSchema,
  sceneContextSchema,
  sceneJsonSchema,
  sceneObjectEntrySchema,
} from './response-schemas';
export type {
  PredictionJson,
  SceneJson,
  SceneObjectEntry,
} from './response-schemas';
