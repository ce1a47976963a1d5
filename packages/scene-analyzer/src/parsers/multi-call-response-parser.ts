import type { LoggerMethods } from '@roadscene/logger';

import type { SubQuery } from '../errors';
import type { MultiCallResponses, PredictionResult } from '../types';

import { MalformedResponseError } from '../errors';
import {
  createDirection,
  createPrediction,
  createSceneContext,
} from '../records';
import {
  normalizeAngle,
  parseConfidence,
  validateActionType,
  validateTimeOfDay,
  validateWeatherCondition,
} from '../validators';
import { BaseResponseParser } from './base-response-parser';

/**
 * Unanchored field patterns, searched anywhere in a sub-response
 */
const FIELD_PATTERNS = {
  Action: /Action:\s*(\w+)/,
  Confidence: /Confidence:\s*([-+]?(?:\d+(?:\.\d+)?|\.\d+))/,
  Weather: /Weather:\s*(\w+)/,
  Time: /Time:\s*(\w+)/,
  Road: /Road:\s*(.+)/,
  Angle: /Angle:\s*([-+]?\d+(?:\.\d+)?)/,
} as const;

type FieldName = keyof typeof FIELD_PATTERNS;

const REQUIRED_FIELDS: Record<SubQuery, readonly FieldName[]> = {
  action: ['Action', 'Confidence'],
  context: ['Weather', 'Time', 'Road'],
  direction: ['Angle', 'Action', 'Confidence'],
};

/**
 * Join the three sub-responses into one labelled text for diagnostics
 */
export function combineResponses(responses: MultiCallResponses): string {
  return [
    `[action]\n${responses.action}`,
    `[context]\n${responses.context}`,
    `[direction]\n${responses.direction}`,
  ].join('\n\n');
}

/**
 * MultiCallResponseParser
 *
 * Three free-text answers (action, scene context, direction), each searched
 * for its own fields. A sub-response missing a field fails with a
 * MalformedResponseError scoped to that sub-query. The direction angle is
 * wrapped into [0, 360).
 */
export class MultiCallResponseParser extends BaseResponseParser {
  constructor(logger?: LoggerMethods) {
    super('MultiCallResponseParser', 'multi-call', logger);
  }

  /**
   * @throws ResponseParsingError
   */
  parse(responses: MultiCallResponses): PredictionResult {
    return this.guard(combineResponses(responses), () => {
      const { action, context, direction } = responses;

      this.requireFields('action', action);
      const prediction = createPrediction(
        validateActionType(this.capture('action', action, 'Action')),
        parseConfidence(this.capture('action', action, 'Confidence')),
      );

      this.requireFields('context', context);
      const sceneContext = createSceneContext(
        validateWeatherCondition(this.capture('context', context, 'Weather')),
        validateTimeOfDay(this.capture('context', context, 'Time')),
        this.capture('context', context, 'Road'),
      );

      this.requireFields('direction', direction);
      const angle = normalizeAngle(
        this.capture('direction', direction, 'Angle'),
        direction,
      );

      return {
        prediction,
        sceneContext,
        direction: createDirection(
          angle,
          validateActionType(this.capture('direction', direction, 'Action')),
          parseConfidence(this.capture('direction', direction, 'Confidence')),
        ),
      };
    });
  }

  /**
   * Fail when any field the sub-query needs is absent
   */
  private requireFields(subQuery: SubQuery, text: string): void {
    const fields = REQUIRED_FIELDS[subQuery];
    const missing = fields.filter((field) => !FIELD_PATTERNS[field].test(text));
    if (missing.length > 0) {
      throw new MalformedResponseError(
        `fields ${fields.map((field) => `${field}:`).join(', ')}`,
        `missing ${missing.join(', ')}`,
        text,
        subQuery,
      );
    }
  }

  private capture(subQuery: SubQuery, text: string, field: FieldName): string {
    const match = FIELD_PATTERNS[field].exec(text);
    if (!match) {
      throw new MalformedResponseError(
        `a "${field}:" field`,
        'no match',
        text,
        subQuery,
      );
    }
    return match[1];
  }
}
