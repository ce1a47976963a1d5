export {
  boxHeight,
  boxWidth,
  createBoundingBox,
  createDetectedObject,
  createDirection,
  createPrediction,
  createSceneContext,
} from './record-builders';
export type { DetectedObjectInit } from './record-builders';
