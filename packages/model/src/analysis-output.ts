/**
 * Aggregate result types for a single analyzed image
 */
import type {
  DetectedObject,
  Direction,
  Prediction,
  SceneContext,
} from './scene-records';

/**
 * Complete analysis of one driving scene image.
 *
 * Built once per request by the output assembler and frozen afterwards.
 */
export interface AnalysisOutput {
  readonly prediction?: Prediction;

  /**
   * Detected objects in model order (may be empty).
   *
   * Boxes are in millirange unless a pixel target was supplied,
   * see `BoundingBox.space`.
   */
  readonly objects: readonly DetectedObject[];

  readonly sceneContext: SceneContext;

  /** Only produced by the multi-call grammar */
  readonly direction?: Direction;

  /** Caller-supplied identifier of the processed image */
  readonly imageId?: string;

  /** Wall-clock processing time in seconds (>= 0) */
  readonly processingTime?: number;
}
