import type { LoggerMethods } from '@roadscene/logger';

import type { PredictionResult } from '../types';

import { MalformedResponseError } from '../errors';
import { createPrediction, createSceneContext } from '../records';
import {
  parseConfidence,
  validateActionType,
  validateTimeOfDay,
  validateWeatherCondition,
} from '../validators';
import { BaseResponseParser } from './base-response-parser';

/**
 * Fixed line order of the grammar. Confidence is captured loosely so that
 * a malformed number surfaces as an invalid confidence, not a bad line.
 */
const ACTION_LINE = /^Action:\s*(\w+),\s*Confidence:\s*(\S+)$/;
const WEATHER_LINE = /^Weather:\s*(\w+)$/;
const TIME_LINE = /^Time:\s*(\w+)$/;
const ROAD_LINE = /^Road:\s*(.+?)$/;

const EXPECTED_LINE_COUNT = 4;

/**
 * LineResponseParser
 *
 * Strict four-line grammar:
 *
 * ```
 * Action: STOP, Confidence: 0.9
 * Weather: clear
 * Time: day
 * Road: urban intersection
 * ```
 *
 * Lines are trimmed and blank lines ignored. Any other line count, or a line
 * out of order, is a malformed response.
 */
export class LineResponseParser extends BaseResponseParser {
  constructor(logger?: LoggerMethods) {
    super('LineResponseParser', 'line', logger);
  }

  /**
   * @throws ResponseParsingError
   */
  parse(content: string): PredictionResult {
    return this.guard(content, () => {
      const lines = content
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);

      if (lines.length !== EXPECTED_LINE_COUNT) {
        throw new MalformedResponseError(
          `${EXPECTED_LINE_COUNT} non-empty lines`,
          `${lines.length} lines`,
          content,
        );
      }

      const [actionToken, confidenceToken] = this.matchLine(
        lines[0],
        ACTION_LINE,
        'Action: <TOKEN>, Confidence: <NUM>',
        content,
      );
      const [weatherToken] = this.matchLine(
        lines[1],
        WEATHER_LINE,
        'Weather: <TOKEN>',
        content,
      );
      const [timeToken] = this.matchLine(
        lines[2],
        TIME_LINE,
        'Time: <TOKEN>',
        content,
      );
      const [roadText] = this.matchLine(
        lines[3],
        ROAD_LINE,
        'Road: <text>',
        content,
      );

      return {
        prediction: createPrediction(
          validateActionType(actionToken),
          parseConfidence(confidenceToken),
        ),
        sceneContext: createSceneContext(
          validateWeatherCondition(weatherToken),
          validateTimeOfDay(timeToken),
          roadText,
        ),
      };
    });
  }

  /**
   * Match one line and return its capture groups
   */
  private matchLine(
    line: string,
    pattern: RegExp,
    format: string,
    content: string,
  ): string[] {
    const match = pattern.exec(line);
    if (!match) {
      throw new MalformedResponseError(
        `a line matching "${format}"`,
        `"${line}"`,
        content,
      );
    }
    return match.slice(1);
  }
}
