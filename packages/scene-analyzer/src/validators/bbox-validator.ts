import type { DropReason } from '@roadscene/model';

import { BBOX_LIMITS, MILLIRANGE_SCALE } from '../config/constants';

/** Box corners as [x_min, y_min, x_max, y_max] */
export type BBoxTuple = [number, number, number, number];

/** Box as sent by the model, every coordinate in [0, 1] */
export type NormalizedBBox = BBoxTuple;

/** Size limits for normalized boxes, as a fraction of the image extent */
export interface BBoxLimits {
  /** Minimum width/height (default 0.01) */
  minSize: number;

  /** Maximum width/height (default 0.9) */
  maxSize: number;
}

export const DEFAULT_BBOX_LIMITS: BBoxLimits = {
  minSize: BBOX_LIMITS.MIN_SIZE,
  maxSize: BBOX_LIMITS.MAX_SIZE,
};

/** Outcome of geometric box validation */
export type BBoxValidationResult =
  | { valid: true; bbox: NormalizedBBox }
  | {
      valid: false;
      reason: Extract<DropReason, `bbox_${string}`>;
      detail: string;
    };

/** Called once the length is known to be four */
function hasFiniteCoordinates(value: unknown[]): value is NormalizedBBox {
  return value.every(
    (coord) => typeof coord === 'number' && Number.isFinite(coord),
  );
}

/**
 * Geometric validation of a normalized bounding box.
 *
 * Checks, in order: exactly four coordinates, all finite numbers, each in
 * [0, 1], min < max on both axes, width/height not below `minSize` and not
 * above `maxSize`.
 */
export function validateNormalizedBBox(
  value: unknown,
  limits: BBoxLimits = DEFAULT_BBOX_LIMITS,
): BBoxValidationResult {
  if (
    !Array.isArray(value) ||
    value.length !== BBOX_LIMITS.COORDINATE_COUNT
  ) {
    return {
      valid: false,
      reason: 'bbox_wrong_length',
      detail: `expected ${BBOX_LIMITS.COORDINATE_COUNT} coordinates, got ${JSON.stringify(value)}`,
    };
  }

  if (!hasFiniteCoordinates(value)) {
    return {
      valid: false,
      reason: 'bbox_not_numeric',
      detail: `expected finite numeric coordinates, got ${JSON.stringify(value)}`,
    };
  }

  if (value.some((coord) => coord < 0 || coord > 1)) {
    return {
      valid: false,
      reason: 'bbox_out_of_range',
      detail: `coordinates must lie in [0, 1], got [${value.join(', ')}]`,
    };
  }

  const [xMin, yMin, xMax, yMax] = value;
  if (xMin >= xMax || yMin >= yMax) {
    return {
      valid: false,
      reason: 'bbox_inverted',
      detail: `expected x_min < x_max and y_min < y_max, got [${value.join(', ')}]`,
    };
  }

  const width = xMax - xMin;
  const height = yMax - yMin;

  if (width < limits.minSize || height < limits.minSize) {
    return {
      valid: false,
      reason: 'bbox_too_small',
      detail: `width ${width} / height ${height} below minimum ${limits.minSize}`,
    };
  }

  if (width > limits.maxSize || height > limits.maxSize) {
    return {
      valid: false,
      reason: 'bbox_too_large',
      detail: `width ${width} / height ${height} above maximum ${limits.maxSize}`,
    };
  }

  return { valid: true, bbox: value };
}

/**
 * Convert normalized coordinates to the integer millirange (× 1000,
 * truncated).
 */
export function toMillirange(bbox: NormalizedBBox): BBoxTuple {
  return [
    Math.trunc(bbox[0] * MILLIRANGE_SCALE),
    Math.trunc(bbox[1] * MILLIRANGE_SCALE),
    Math.trunc(bbox[2] * MILLIRANGE_SCALE),
    Math.trunc(bbox[3] * MILLIRANGE_SCALE),
  ];
}
