import { SceneAnalysisError } from './scene-analysis-error';

/** Discriminant shared by every model-output error */
export type ModelOutputErrorKind =
  | 'malformed_response'
  | 'invalid_enum_value'
  | 'invalid_confidence'
  | 'incomplete_output';

/** Sub-queries of the multi-call grammar */
export type SubQuery = 'action' | 'context' | 'direction';

/**
 * ModelOutputError
 *
 * Base class for "the model answered, but the answer could not be
 * understood". Each variant carries enough context to rebuild a diagnostic
 * without re-parsing the response.
 */
export abstract class ModelOutputError extends SceneAnalysisError {
  abstract readonly kind: ModelOutputErrorKind;

  /**
   * Get formatted multi-line diagnostic
   */
  abstract getSummary(): string;
}

/**
 * Structural failure: wrong shape, wrong line count, unparsable JSON,
 * missing key or missing field.
 */
export class MalformedResponseError extends ModelOutputError {
  readonly kind = 'malformed_response' as const;

  /** What the grammar required */
  readonly expected: string;

  /** What was found instead */
  readonly got: string;

  /** Full response text the failure was found in */
  readonly rawContent: string;

  /** Multi-call sub-query the response belonged to */
  readonly subQuery?: SubQuery;

  constructor(
    expected: string,
    got: string,
    rawContent: string,
    subQuery?: SubQuery,
    options?: ErrorOptions,
  ) {
    const scope = subQuery ? `${subQuery} ` : '';
    super(
      `Malformed ${scope}response: expected ${expected}, got ${got}`,
      options,
    );
    this.name = 'MalformedResponseError';
    this.expected = expected;
    this.got = got;
    this.rawContent = rawContent;
    this.subQuery = subQuery;
  }

  getSummary(): string {
    const lines = [
      'Malformed response',
      `  Expected: ${this.expected}`,
      `  Got: ${this.got}`,
    ];
    if (this.subQuery) {
      lines.push(`  Sub-query: ${this.subQuery}`);
    }
    lines.push('  Raw content:', this.rawContent);
    return lines.join('\n');
  }
}

/**
 * A recognized field carried a value outside its closed set.
 */
export class InvalidEnumValueError extends ModelOutputError {
  readonly kind = 'invalid_enum_value' as const;
  readonly field: string;
  readonly rawValue: string;
  readonly allowedValues: readonly string[];

  constructor(
    field: string,
    rawValue: string,
    allowedValues: readonly string[],
  ) {
    super(
      `Invalid ${field} value "${rawValue}". Allowed values: ${allowedValues.join(', ')}`,
    );
    this.name = 'InvalidEnumValueError';
    this.field = field;
    this.rawValue = rawValue;
    this.allowedValues = allowedValues;
  }

  getSummary(): string {
    return [
      `Invalid value for ${this.field}`,
      `  Got: "${this.rawValue}"`,
      `  Allowed: ${this.allowedValues.join(', ')}`,
    ].join('\n');
  }
}

/**
 * A confidence value was unparsable or outside [0, 1].
 */
export class InvalidConfidenceError extends ModelOutputError {
  readonly kind = 'invalid_confidence' as const;
  readonly rawValue: string;

  constructor(rawValue: string) {
    super(
      `Invalid confidence "${rawValue}": expected a number between 0 and 1`,
    );
    this.name = 'InvalidConfidenceError';
    this.rawValue = rawValue;
  }

  getSummary(): string {
    return [
      'Invalid confidence',
      `  Got: "${this.rawValue}"`,
      '  Allowed: 0 <= confidence <= 1',
    ].join('\n');
  }
}

/**
 * A required field was missing when assembling the aggregate result.
 */
export class IncompleteOutputError extends ModelOutputError {
  readonly kind = 'incomplete_output' as const;
  readonly missingField: string;

  constructor(missingField: string) {
    super(`Incomplete output: missing required field "${missingField}"`);
    this.name = 'IncompleteOutputError';
    this.missingField = missingField;
  }

  getSummary(): string {
    return `Incomplete output\n  Missing: ${this.missingField}`;
  }
}
