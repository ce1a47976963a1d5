/**
 * Closed value sets shared by every parser and consumer.
 *
 * Enum values are the exact wire tokens the vision model is asked to emit.
 */

/** Driving action recommended for the scene (upper-case tokens) */
export enum ActionType {
  STOP = 'STOP',
  CONTINUE = 'CONTINUE',
  TURN_LEFT = 'TURN_LEFT',
  TURN_RIGHT = 'TURN_RIGHT',
  SLOW_DOWN = 'SLOW_DOWN',
}

/** Kinds of objects the scene analysis may report */
export enum ObjectType {
  VEHICLE = 'vehicle',
  PEDESTRIAN = 'pedestrian',
  TRAFFIC_LIGHT = 'traffic_light',
  TRAFFIC_SIGN = 'traffic_sign',
  BUS = 'bus',
  CAR = 'car',
}

export enum WeatherCondition {
  CLEAR = 'clear',
  RAINY = 'rainy',
  SNOWY = 'snowy',
  FOGGY = 'foggy',
  CLOUDY = 'cloudy',
}

export enum TimeOfDay {
  DAY = 'day',
  NIGHT = 'night',
  DAWN = 'dawn',
  DUSK = 'dusk',
}

/** Signal state, attached only to traffic-light objects */
export enum TrafficLightState {
  RED = 'red',
  YELLOW = 'yellow',
  GREEN = 'green',
}

/**
 * Coordinate space a bounding box is expressed in.
 *
 * - `millirange`: integers in [0, 1000], i.e. a normalized [0, 1] value × 1000
 * - `pixel`: integers in the pixel grid of a concrete image
 */
export enum CoordinateSpace {
  MILLIRANGE = 'millirange',
  PIXEL = 'pixel',
}
