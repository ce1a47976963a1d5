import type { LoggerMethods } from '@roadscene/logger';

import type { PredictionResponse, PredictionResult } from '../types';

import { LineResponseParser } from './line-response-parser';
import { MultiCallResponseParser } from './multi-call-response-parser';
import { PredictionJsonParser } from './prediction-json-parser';

/**
 * PredictionResponseParser
 *
 * Routes a tagged response to the parser for its grammar.
 */
export class PredictionResponseParser {
  private readonly lineParser: LineResponseParser;
  private readonly jsonParser: PredictionJsonParser;
  private readonly multiCallParser: MultiCallResponseParser;

  constructor(logger?: LoggerMethods) {
    this.lineParser = new LineResponseParser(logger);
    this.jsonParser = new PredictionJsonParser(logger);
    this.multiCallParser = new MultiCallResponseParser(logger);
  }

  /**
   * @throws ResponseParsingError
   */
  parse(response: PredictionResponse): PredictionResult {
    switch (response.grammar) {
      case 'line':
        return this.lineParser.parse(response.content);
      case 'json':
        return this.jsonParser.parse(response.content);
      case 'multi-call':
        return this.multiCallParser.parse(response.responses);
    }
  }
}
