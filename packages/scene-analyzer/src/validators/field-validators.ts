import {
  ActionType,
  ObjectType,
  TimeOfDay,
  TrafficLightState,
  WeatherCondition,
} from '@roadscene/model';

import { FULL_TURN_DEGREES } from '../config/constants';
import {
  InvalidConfidenceError,
  InvalidEnumValueError,
  MalformedResponseError,
} from '../errors';

/**
 * Accepted confidence spellings: `0`, `0.x`, `.x`, `1`, `1.0`.
 * Negative numbers, values above one and exponents are rejected.
 */
const CONFIDENCE_PATTERN = /^(?:0?\.\d+|0|1(?:\.0+)?)$/;

/** Signed decimal without exponent */
const ANGLE_PATTERN = /^[-+]?(?:\d+(?:\.\d+)?|\.\d+)$/;

export const ACTION_VALUES: readonly ActionType[] = Object.values(ActionType);
export const OBJECT_TYPE_VALUES: readonly ObjectType[] =
  Object.values(ObjectType);
export const WEATHER_VALUES: readonly WeatherCondition[] =
  Object.values(WeatherCondition);
export const TIME_OF_DAY_VALUES: readonly TimeOfDay[] =
  Object.values(TimeOfDay);
export const TRAFFIC_LIGHT_STATE_VALUES: readonly TrafficLightState[] =
  Object.values(TrafficLightState);

function matchEnumValue<T extends string>(
  field: string,
  raw: string,
  allowedValues: readonly T[],
  caseInsensitive: boolean,
): T {
  const trimmed = raw.trim();
  const candidate = caseInsensitive ? trimmed.toLowerCase() : trimmed;
  const match = allowedValues.find((value) => value === candidate);
  if (match === undefined) {
    throw new InvalidEnumValueError(field, raw, allowedValues);
  }
  return match;
}

/**
 * Validate a driving action token. Case-sensitive: actions are upper-case
 * tokens by contract.
 */
export function validateActionType(raw: string): ActionType {
  return matchEnumValue('action', raw, ACTION_VALUES, false);
}

export function validateWeatherCondition(raw: string): WeatherCondition {
  return matchEnumValue('weather', raw, WEATHER_VALUES, true);
}

export function validateTimeOfDay(raw: string): TimeOfDay {
  return matchEnumValue('time_of_day', raw, TIME_OF_DAY_VALUES, true);
}

export function validateObjectType(raw: string): ObjectType {
  return matchEnumValue('object_type', raw, OBJECT_TYPE_VALUES, true);
}

export function validateTrafficLightState(raw: string): TrafficLightState {
  return matchEnumValue(
    'traffic_light_state',
    raw,
    TRAFFIC_LIGHT_STATE_VALUES,
    true,
  );
}

/**
 * Parse a confidence value.
 *
 * Strings must use one of the accepted spellings; numbers must be finite
 * and inside [0, 1]. The numeric value is returned unchanged.
 *
 * @throws InvalidConfidenceError
 */
export function parseConfidence(raw: string | number): number {
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw) || raw < 0 || raw > 1) {
      throw new InvalidConfidenceError(String(raw));
    }
    return raw;
  }

  const token = raw.trim();
  if (!CONFIDENCE_PATTERN.test(token)) {
    throw new InvalidConfidenceError(raw);
  }
  return Number(token);
}

/**
 * Parse an angle in degrees and wrap it into [0, 360).
 *
 * @param raw - Angle token or number
 * @param rawContent - Response the token came from, kept for diagnostics
 * @throws MalformedResponseError when the value is not a finite decimal
 */
export function normalizeAngle(
  raw: string | number,
  rawContent: string = String(raw),
): number {
  const value =
    typeof raw === 'number'
      ? raw
      : ANGLE_PATTERN.test(raw.trim())
        ? Number(raw.trim())
        : Number.NaN;

  if (!Number.isFinite(value)) {
    throw new MalformedResponseError(
      'a numeric angle in degrees',
      `"${raw}"`,
      rawContent,
    );
  }

  const wrapped =
    ((value % FULL_TURN_DEGREES) + FULL_TURN_DEGREES) % FULL_TURN_DEGREES;
  // -0 % 360 stays -0
  return wrapped === 0 ? 0 : wrapped;
}

/**
 * Trim a road description and require it to be non-empty.
 *
 * @throws MalformedResponseError
 */
export function validateRoadType(
  raw: string,
  rawContent: string = raw,
): string {
  const roadType = raw.trim();
  if (roadType.length === 0) {
    throw new MalformedResponseError(
      'a non-empty road description',
      'an empty value',
      rawContent,
    );
  }
  return roadType;
}
