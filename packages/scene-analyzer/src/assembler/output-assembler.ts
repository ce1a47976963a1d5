import type {
  AnalysisOutput,
  DetectedObject,
  Direction,
  Prediction,
  SceneContext,
} from '@roadscene/model';

import { IncompleteOutputError } from '../errors';

/**
 * Pieces collected for one analyzed image
 */
export interface OutputParts {
  prediction?: Prediction;
  objects?: readonly DetectedObject[];
  sceneContext?: SceneContext;
  direction?: Direction;
  imageId?: string;
  processingTime?: number;
}

/**
 * Combine parsed parts into a frozen AnalysisOutput.
 *
 * The parts were validated when they were built, so only the presence of
 * the scene context is checked here. Object order is preserved and absent
 * optional parts are left out of the result.
 *
 * @throws IncompleteOutputError when `sceneContext` is missing
 */
export function assembleOutput(parts: OutputParts): AnalysisOutput {
  const { sceneContext } = parts;
  if (!sceneContext) {
    throw new IncompleteOutputError('sceneContext');
  }

  return Object.freeze({
    ...(parts.prediction ? { prediction: parts.prediction } : {}),
    objects: Object.freeze([...(parts.objects ?? [])]),
    sceneContext,
    ...(parts.direction ? { direction: parts.direction } : {}),
    ...(parts.imageId !== undefined ? { imageId: parts.imageId } : {}),
    ...(parts.processingTime !== undefined
      ? { processingTime: parts.processingTime }
      : {}),
  });
}
