import type {
  ActionType,
  CoordinateSpace,
  ObjectType,
  TimeOfDay,
  TrafficLightState,
  WeatherCondition,
} from './driving-enums';

/** Free-form metadata attached to a record */
export type RecordMetadata = Record<string, unknown>;

/**
 * Axis-aligned box with integer corners.
 *
 * Invariant: all coordinates are non-negative integers,
 * `xMin < xMax` and `yMin < yMax`.
 */
export interface BoundingBox {
  xMin: number;
  yMin: number;
  xMax: number;
  yMax: number;

  /** Which coordinate space the corners are in */
  space: CoordinateSpace;
}

/** A single object detected in the scene */
export interface DetectedObject {
  type: ObjectType;
  bbox: BoundingBox;

  /** Detection confidence in [0, 1] */
  confidence: number;

  /** Present only for `traffic_light` objects */
  state?: TrafficLightState;
  metadata?: RecordMetadata;
}

/** Predicted driving action */
export interface Prediction {
  action: ActionType;

  /** Confidence in [0, 1] */
  confidence: number;
  metadata?: RecordMetadata;
}

/** Steering direction produced by the multi-call grammar */
export interface Direction {
  /** Heading in degrees, normalized to [0, 360) */
  angle: number;
  type: ActionType;

  /** Confidence in [0, 1] */
  confidence: number;
}

/** Environmental context of the scene */
export interface SceneContext {
  weather: WeatherCondition;
  timeOfDay: TimeOfDay;

  /** Short description such as "highway" or "urban intersection" (non-empty) */
  roadType: string;
  metadata?: RecordMetadata;
}
