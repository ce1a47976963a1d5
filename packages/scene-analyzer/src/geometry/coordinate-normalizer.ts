import type { LoggerMethods } from '@roadscene/logger';
import type { DetectedObject, DroppedObject } from '@roadscene/model';

import type { ImageSize } from '../types';

import { CoordinateSpace } from '@roadscene/model';

import { MILLIRANGE_SCALE } from '../config/constants';
import { CoordinateSpaceError } from '../errors';
import { createBoundingBox } from '../records';

/**
 * Result of {@link CoordinateNormalizer.rescale}
 */
export interface RescaleResult {
  objects: DetectedObject[];

  /** Boxes that lost all extent when mapped onto the pixel grid */
  dropped: DroppedObject[];
}

/**
 * CoordinateNormalizer
 *
 * Maps millirange boxes onto the pixel grid of a target image:
 * `pixel = trunc(millirange * dimension / 1000)`.
 *
 * Every box carries its coordinate space, so a list can only be rescaled
 * once; a pixel-space box raises CoordinateSpaceError. Inputs are never
 * mutated.
 */
export class CoordinateNormalizer {
  private readonly logger?: LoggerMethods;

  constructor(logger?: LoggerMethods) {
    this.logger = logger;
  }

  /**
   * @param objects - Objects with millirange boxes
   * @param target - Pixel size of the image; omitted means no rescaling
   * @throws CoordinateSpaceError
   */
  rescale(
    objects: readonly DetectedObject[],
    target?: ImageSize,
  ): RescaleResult {
    if (!target) {
      return { objects: [...objects], dropped: [] };
    }
    this.assertTarget(target);

    const rescaled: DetectedObject[] = [];
    const dropped: DroppedObject[] = [];

    objects.forEach((object, index) => {
      if (object.bbox.space !== CoordinateSpace.MILLIRANGE) {
        throw new CoordinateSpaceError(
          `Object #${index} is already in ${object.bbox.space} space and cannot be rescaled again`,
        );
      }

      const xMin = this.toPixel(object.bbox.xMin, target.width);
      const yMin = this.toPixel(object.bbox.yMin, target.height);
      const xMax = this.toPixel(object.bbox.xMax, target.width);
      const yMax = this.toPixel(object.bbox.yMax, target.height);

      if (xMin >= xMax || yMin >= yMax) {
        const detail = `box [${xMin}, ${yMin}, ${xMax}, ${yMax}] has no extent at ${target.width}x${target.height}`;
        this.logger?.warn(
          `[CoordinateNormalizer] Dropped object #${index}: ${detail}`,
        );
        dropped.push({ index, reason: 'bbox_collapsed', detail, entry: object });
        return;
      }

      rescaled.push({
        ...object,
        bbox: createBoundingBox(xMin, yMin, xMax, yMax, CoordinateSpace.PIXEL),
      });
    });

    return { objects: rescaled, dropped };
  }

  private toPixel(coordinate: number, dimension: number): number {
    return Math.trunc((coordinate * dimension) / MILLIRANGE_SCALE);
  }

  private assertTarget(target: ImageSize): void {
    const { width, height } = target;
    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw new CoordinateSpaceError(
        `Target image size must be positive integers, got ${width}x${height}`,
      );
    }
  }
}
