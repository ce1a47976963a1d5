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
import { describeSchemaError, predictionJsonSchema } from './response-schemas';

/**
 * PredictionJsonParser
 *
 * Single JSON object with case-sensitive keys `Action`, `Confidence`,
 * `Weather`, `Time` and `Road`. Values go through the same field validators
 * as the line grammar.
 */
export class PredictionJsonParser extends BaseResponseParser {
  constructor(logger?: LoggerMethods) {
    super('PredictionJsonParser', 'json', logger);
  }

  /**
   * @throws ResponseParsingError
   */
  parse(content: string): PredictionResult {
    return this.guard(content, () => {
      const parsed = predictionJsonSchema.safeParse(this.readJson(content));
      if (!parsed.success) {
        throw new MalformedResponseError(
          'a JSON object with keys Action, Confidence, Weather, Time, Road',
          describeSchemaError(parsed.error),
          content,
        );
      }

      const data = parsed.data;
      return {
        prediction: createPrediction(
          validateActionType(data.Action),
          parseConfidence(data.Confidence),
        ),
        sceneContext: createSceneContext(
          validateWeatherCondition(data.Weather),
          validateTimeOfDay(data.Time),
          data.Road,
        ),
      };
    });
  }
}
