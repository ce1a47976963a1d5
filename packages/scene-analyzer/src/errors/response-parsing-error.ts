import type { ModelOutputError, ModelOutputErrorKind } from './model-output-error';

import { SceneAnalysisError } from './scene-analysis-error';

/** Response grammars understood by the parsers */
export type ResponseGrammar = 'line' | 'json' | 'multi-call' | 'scene-json';

/**
 * ResponseParsingError
 *
 * Raised by every parser strategy. Wraps the precise sub-reason and always
 * keeps the original response text.
 */
export class ResponseParsingError extends SceneAnalysisError {
  /** Grammar the parser was applying */
  readonly grammar: ResponseGrammar;

  /** Precise failure */
  readonly reason: ModelOutputError;

  /** Complete original response text (all sub-responses for multi-call) */
  readonly rawContent: string;

  constructor(
    grammar: ResponseGrammar,
    reason: ModelOutputError,
    rawContent: string,
  ) {
    super(`Failed to parse ${grammar} response: ${reason.message}`, {
      cause: reason,
    });
    this.name = 'ResponseParsingError';
    this.grammar = grammar;
    this.reason = reason;
    this.rawContent = rawContent;
  }

  /** Kind of the wrapped failure */
  get kind(): ModelOutputErrorKind {
    return this.reason.kind;
  }

  /**
   * Get formatted error summary including the raw response
   */
  getSummary(): string {
    return [
      `Response parsing failed (${this.grammar})`,
      '',
      this.reason.getSummary(),
      '',
      'Response:',
      this.rawContent,
    ].join('\n');
  }
}
