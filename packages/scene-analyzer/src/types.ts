import type {
  DetectedObject,
  Direction,
  ObjectParseDiagnostics,
  Prediction,
  SceneContext,
} from '@roadscene/model';

/**
 * Result of the prediction grammars (line, JSON, multi-call)
 */
export interface PredictionResult {
  prediction: Prediction;
  sceneContext: SceneContext;

  /** Only set by the multi-call grammar */
  direction?: Direction;
}

/**
 * Result of the scene JSON dialect
 */
export interface SceneParseResult {
  /** Accepted objects, boxes in millirange */
  objects: DetectedObject[];
  sceneContext: SceneContext;
  diagnostics: ObjectParseDiagnostics;
}

/**
 * The three free-text answers of the multi-call grammar
 */
export interface MultiCallResponses {
  action: string;
  context: string;
  direction: string;
}

/**
 * Raw model output tagged with the grammar it was requested in.
 * Grammars are chosen by the caller, never detected from content.
 */
export type PredictionResponse =
  | { grammar: 'line'; content: string }
  | { grammar: 'json'; content: string }
  | { grammar: 'multi-call'; responses: MultiCallResponses };

export type PredictionGrammar = PredictionResponse['grammar'];

/**
 * Pixel dimensions of the target image
 */
export interface ImageSize {
  width: number;
  height: number;
}
