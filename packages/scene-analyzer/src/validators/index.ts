export {
  DEFAULT_BBOX_LIMITS,
  toMillirange,
  validateNormalizedBBox,
} from './bbox-validator';
export type {
  BBoxLimits,
  BBoxTuple,
  BBoxValidationResult,
  NormalizedBBox,
} from './bbox-validator';
export {
  ACTION_VALUES,
  OBJECT_TYPE_VALUES,
  TIME_OF_DAY_VALUES,
  TRAFFIC_LIGHT_STATE_VALUES,
  WEATHER_VALUES,
  normalizeAngle,
  parseConfidence,
  validateActionType,
  validateObjectType,
  validateRoadType,
  validateTimeOfDay,
  validateTrafficLightState,
  validateWeatherCondition,
} from './field-validators';
