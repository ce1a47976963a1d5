/**
 * Geometry limits applied to normalized [0, 1] bounding boxes
 */
export const BBOX_LIMITS = {
  /**
   * Smallest accepted width/height (1% of the image extent)
   */
  MIN_SIZE: 0.01,

  /**
   * Largest accepted width/height. Anything wider or taller is treated as a
   * spurious full-image detection.
   */
  MAX_SIZE: 0.9,

  /**
   * Number of coordinates in a box: [x_min, y_min, x_max, y_max]
   */
  COORDINATE_COUNT: 4,
} as const;

/**
 * Scale of the internal integer coordinate range
 */
export const MILLIRANGE_SCALE = 1000;

/** Degrees in a full turn, used to wrap direction angles */
export const FULL_TURN_DEGREES = 360;

/**
 * Configuration constants for DrivingSceneAnalyzer
 */
export const SCENE_ANALYZER = {
  /**
   * Retry count handed to the AI SDK per model
   */
  DEFAULT_MAX_RETRIES: 3,

  /**
   * Temperature for action prediction calls
   */
  DEFAULT_TEMPERATURE: 0,

  /**
   * Images analyzed in parallel by analyzeImages()
   */
  DEFAULT_CONCURRENCY: 1,
} as const;

/**
 * Sampling used for the scene (object detection) call. A low temperature
 * and fixed seed keep detections stable between runs.
 */
export const SCENE_SAMPLING = {
  TEMPERATURE: 0.5,
  TOP_P: 0.5,
  SEED: 42,
  MAX_OUTPUT_TOKENS: 1024,
} as const;
