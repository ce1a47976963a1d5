import type {
  ActionType,
  BoundingBox,
  DetectedObject,
  Direction,
  Prediction,
  RecordMetadata,
  SceneContext,
  TimeOfDay,
  TrafficLightState,
  WeatherCondition,
} from '@roadscene/model';

import { CoordinateSpace, ObjectType } from '@roadscene/model';

import { FULL_TURN_DEGREES, MILLIRANGE_SCALE } from '../config/constants';
import { MalformedResponseError } from '../errors';
import { parseConfidence, validateRoadType } from '../validators';

/**
 * Input for {@link createDetectedObject}
 */
export interface DetectedObjectInit {
  type: ObjectType;
  bbox: BoundingBox;
  confidence: number;
  state?: TrafficLightState;
  metadata?: RecordMetadata;
}

function isCorner(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

/**
 * Build a bounding box, enforcing integer non-negative corners with
 * `xMin < xMax` and `yMin < yMax`. Millirange boxes must also stay within
 * [0, 1000].
 *
 * @throws MalformedResponseError
 */
export function createBoundingBox(
  xMin: number,
  yMin: number,
  xMax: number,
  yMax: number,
  space: CoordinateSpace = CoordinateSpace.MILLIRANGE,
): BoundingBox {
  const corners = [xMin, yMin, xMax, yMax];
  const rawContent = JSON.stringify(corners);

  if (!corners.every(isCorner)) {
    throw new MalformedResponseError(
      'non-negative integer box corners',
      rawContent,
      rawContent,
    );
  }
  if (xMin >= xMax || yMin >= yMax) {
    throw new MalformedResponseError(
      'x_min < x_max and y_min < y_max',
      rawContent,
      rawContent,
    );
  }
  if (
    space === CoordinateSpace.MILLIRANGE &&
    corners.some((corner) => corner > MILLIRANGE_SCALE)
  ) {
    throw new MalformedResponseError(
      `millirange corners within [0, ${MILLIRANGE_SCALE}]`,
      rawContent,
      rawContent,
    );
  }

  return { xMin, yMin, xMax, yMax, space };
}

export function boxWidth(bbox: BoundingBox): number {
  return bbox.xMax - bbox.xMin;
}

export function boxHeight(bbox: BoundingBox): number {
  return bbox.yMax - bbox.yMin;
}

/**
 * Build a detected object. A `state` is only accepted on traffic lights.
 *
 * @throws InvalidConfidenceError
 * @throws MalformedResponseError
 */
export function createDetectedObject(init: DetectedObjectInit): DetectedObject {
  const confidence = parseConfidence(init.confidence);

  if (init.state !== undefined && init.type !== ObjectType.TRAFFIC_LIGHT) {
    throw new MalformedResponseError(
      'a state only on traffic_light objects',
      `state "${init.state}" on ${init.type}`,
      JSON.stringify(init),
    );
  }

  const object: DetectedObject = {
    type: init.type,
    bbox: { ...init.bbox },
    confidence,
  };
  if (init.state !== undefined) {
    object.state = init.state;
  }
  if (init.metadata !== undefined) {
    object.metadata = { ...init.metadata };
  }
  return object;
}

export function createPrediction(
  action: ActionType,
  confidence: number,
  metadata?: RecordMetadata,
): Prediction {
  const prediction: Prediction = {
    action,
    confidence: parseConfidence(confidence),
  };
  if (metadata !== undefined) {
    prediction.metadata = { ...metadata };
  }
  return prediction;
}

/**
 * @throws MalformedResponseError when the road description is blank
 */
export function createSceneContext(
  weather: WeatherCondition,
  timeOfDay: TimeOfDay,
  roadType: string,
  metadata?: RecordMetadata,
): SceneContext {
  const context: SceneContext = {
    weather,
    timeOfDay,
    roadType: validateRoadType(roadType),
  };
  if (metadata !== undefined) {
    context.metadata = { ...metadata };
  }
  return context;
}

/**
 * Build a direction. The angle must already be wrapped into [0, 360).
 */
export function createDirection(
  angle: number,
  type: ActionType,
  confidence: number,
): Direction {
  if (!Number.isFinite(angle) || angle < 0 || angle >= FULL_TURN_DEGREES) {
    throw new MalformedResponseError(
      `an angle in [0, ${FULL_TURN_DEGREES})`,
      String(angle),
      String(angle),
    );
  }
  return { angle, type, confidence: parseConfidence(confidence) };
}
