export {
  ActionType,
  CoordinateSpace,
  ObjectType,
  TimeOfDay,
  TrafficLightState,
  WeatherCondition,
} from './driving-enums';
export type {
  BoundingBox,
  DetectedObject,
  Direction,
  Prediction,
  RecordMetadata,
  SceneContext,
} from './scene-records';
export type { AnalysisOutput } from './analysis-output';
export type {
  DropReason,
  DroppedObject,
  ObjectParseDiagnostics,
} from './parse-diagnostics';
