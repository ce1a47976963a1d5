import {
  ACTION_VALUES,
  OBJECT_TYPE_VALUES,
  TIME_OF_DAY_VALUES,
  TRAFFIC_LIGHT_STATE_VALUES,
  WEATHER_VALUES,
} from '../validators';

/**
 * Prompts sent to the vision model, one per response grammar
 */
export interface DrivingPrompts {
  /** Four-line prediction grammar */
  line: string;

  /** Single JSON object prediction grammar */
  json: string;

  /** Scene JSON dialect (objects + context) */
  scene: string;

  /** The three free-text sub-queries of the multi-call grammar */
  multiCall: {
    action: string;
    context: string;
    direction: string;
  };
}

/**
 * Caller overrides; missing entries fall back to the defaults
 */
export interface DrivingPromptOverrides {
  line?: string;
  json?: string;
  scene?: string;
  multiCall?: Partial<DrivingPrompts['multiCall']>;
}

const allowedValues = (values: readonly string[]): string => values.join(', ');

const ALLOWED_VALUES_BLOCK = [
  `Allowed ACTION values: ${allowedValues(ACTION_VALUES)}`,
  `Allowed WEATHER values: ${allowedValues(WEATHER_VALUES)}`,
  `Allowed TIME values: ${allowedValues(TIME_OF_DAY_VALUES)}`,
].join('\n');

const STRICT_HEADER =
  'Analyze this driving scene and respond using EXACTLY the following format with EXACTLY these allowed values. Do not use any other values.';

export function buildLinePrompt(): string {
  return [
    STRICT_HEADER,
    '',
    ALLOWED_VALUES_BLOCK,
    '',
    'Required format (exactly four lines):',
    'Action: [EXACT ACTION VALUE], Confidence: [NUMBER 0-1]',
    'Weather: [EXACT WEATHER VALUE]',
    'Time: [EXACT TIME VALUE]',
    'Road: [BRIEF DESCRIPTION]',
  ].join('\n');
}

export function buildJsonPrompt(): string {
  return [
    STRICT_HEADER,
    '',
    ALLOWED_VALUES_BLOCK,
    '',
    'Required format (in JSON):',
    '{',
    '  "Action": "[EXACT ACTION VALUE]",',
    '  "Confidence": [NUMBER 0-1],',
    '  "Weather": "[EXACT WEATHER VALUE]",',
    '  "Time": "[EXACT TIME VALUE]",',
    '  "Road": "[BRIEF DESCRIPTION]"',
    '}',
  ].join('\n');
}

export function buildScenePrompt(): string {
  return [
    'Detect the objects in this driving scene and describe its conditions.',
    'Respond with a single JSON object and nothing else.',
    '',
    `Allowed object types: ${allowedValues(OBJECT_TYPE_VALUES)}`,
    `Allowed traffic light states: ${allowedValues(TRAFFIC_LIGHT_STATE_VALUES)}`,
    `Allowed weather values: ${allowedValues(WEATHER_VALUES)}`,
    `Allowed time values: ${allowedValues(TIME_OF_DAY_VALUES)}`,
    '',
    'Bounding boxes are [x_min, y_min, x_max, y_max] as fractions of the image width and height (0 to 1).',
    'Add "state" only to traffic_light objects.',
    '',
    'Required format:',
    '{',
    '  "objects": [{"type": "vehicle", "bbox": [0.1, 0.2, 0.3, 0.4], "confidence": 0.9}],',
    '  "context": {"weather": "clear", "time": "day", "road": "highway"}',
    '}',
  ].join('\n');
}

export function buildMultiCallPrompts(): DrivingPrompts['multiCall'] {
  return {
    action: [
      'What should the driver of this vehicle do next?',
      `Answer with "Action: <one of ${allowedValues(ACTION_VALUES)}>" and "Confidence: <number 0-1>".`,
    ].join('\n'),
    context: [
      'Describe the driving conditions in this image.',
      `Answer with "Weather: <one of ${allowedValues(WEATHER_VALUES)}>",`,
      `"Time: <one of ${allowedValues(TIME_OF_DAY_VALUES)}>" and "Road: <brief description>".`,
    ].join('\n'),
    direction: [
      'Which heading should the vehicle take?',
      'Answer with "Angle: <degrees, 0 is straight ahead, clockwise>",',
      `"Action: <one of ${allowedValues(ACTION_VALUES)}>" and "Confidence: <number 0-1>".`,
    ].join('\n'),
  };
}

export const DEFAULT_DRIVING_PROMPTS: DrivingPrompts = {
  line: buildLinePrompt(),
  json: buildJsonPrompt(),
  scene: buildScenePrompt(),
  multiCall: buildMultiCallPrompts(),
};

/**
 * Merge caller overrides onto the default prompts
 */
export function resolvePrompts(
  overrides: DrivingPromptOverrides = {},
): DrivingPrompts {
  return {
    line: overrides.line ?? DEFAULT_DRIVING_PROMPTS.line,
    json: overrides.json ?? DEFAULT_DRIVING_PROMPTS.json,
    scene: overrides.scene ?? DEFAULT_DRIVING_PROMPTS.scene,
    multiCall: {
      ...DEFAULT_DRIVING_PROMPTS.multiCall,
      ...overrides.multiCall,
    },
  };
}
