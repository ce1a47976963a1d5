import type { LoggerMethods } from '@roadscene/logger';

import type { ResponseGrammar } from '../errors';

import {
  MalformedResponseError,
  ModelOutputError,
  ResponseParsingError,
  SceneAnalysisError,
} from '../errors';

/**
 * Abstract base class for response parsers
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix (logger is optional,
 *   parsing itself never depends on it)
 * - Conversion of model-output failures into ResponseParsingError with the
 *   complete raw response attached
 */
export abstract class BaseResponseParser {
  protected readonly logger?: LoggerMethods;
  protected readonly componentName: string;
  protected readonly grammar: ResponseGrammar;

  /**
   * @param componentName - Name used as log prefix (e.g., "LineResponseParser")
   * @param grammar - Grammar reported in ResponseParsingError
   * @param logger - Optional logger for diagnostics
   */
  constructor(
    componentName: string,
    grammar: ResponseGrammar,
    logger?: LoggerMethods,
  ) {
    this.componentName = componentName;
    this.grammar = grammar;
    this.logger = logger;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'debug' | 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    this.logger?.[level](`[${this.componentName}] ${message}`, ...args);
  }

  /**
   * Run the extraction steps for one response. Any ModelOutputError raised
   * inside is rethrown as ResponseParsingError carrying `rawContent`.
   */
  protected guard<T>(rawContent: string, extract: () => T): T {
    this.log('debug', 'Parsing response', rawContent);
    try {
      return extract();
    } catch (error) {
      if (error instanceof ModelOutputError) {
        this.fail(error, rawContent);
      }
      throw error;
    }
  }

  /**
   * Parse JSON text, failing with MalformedResponseError when it is not JSON
   */
  protected readJson(content: string): unknown {
    try {
      return JSON.parse(content);
    } catch (error) {
      throw new MalformedResponseError(
        'valid JSON',
        `invalid JSON (${SceneAnalysisError.getErrorMessage(error)})`,
        content,
        undefined,
        { cause: error },
      );
    }
  }

  /**
   * Raise a ResponseParsingError for the given reason
   */
  protected fail(reason: ModelOutputError, rawContent: string): never {
    this.log('error', `Failed to parse ${this.grammar} response`, reason.message);
    throw new ResponseParsingError(this.grammar, reason, rawContent);
  }
}
