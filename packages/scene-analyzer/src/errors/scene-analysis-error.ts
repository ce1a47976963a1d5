/**
 * SceneAnalysisError
 *
 * Root of every error raised by the scene analyzer package.
 */
export class SceneAnalysisError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SceneAnalysisError';
  }

  /**
   * Extract error message from unknown error type
   */
  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  /**
   * Create SceneAnalysisError from unknown error with context
   */
  static fromError(context: string, error: unknown): SceneAnalysisError {
    return new SceneAnalysisError(
      `${context}: ${SceneAnalysisError.getErrorMessage(error)}`,
      { cause: error },
    );
  }
}

/**
 * ModelInvocationError
 *
 * The external model collaborator failed (network, provider, unreadable
 * image, abort). The original error is kept as `cause`.
 */
export class ModelInvocationError extends SceneAnalysisError {
  /** Component that issued the call */
  readonly component: string;

  /** Phase of the call (e.g. 'prediction', 'scene-analysis') */
  readonly phase: string;

  constructor(
    message: string,
    component: string,
    phase: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ModelInvocationError';
    this.component = component;
    this.phase = phase;
  }

  /**
   * Wrap a collaborator failure
   */
  static wrap(
    component: string,
    phase: string,
    error: unknown,
  ): ModelInvocationError {
    return new ModelInvocationError(
      `Model call failed during ${phase}: ${SceneAnalysisError.getErrorMessage(error)}`,
      component,
      phase,
      { cause: error },
    );
  }
}

/**
 * CoordinateSpaceError
 *
 * Rescaling was requested on geometry that is not in millirange, or with an
 * unusable pixel target.
 */
export class CoordinateSpaceError extends SceneAnalysisError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CoordinateSpaceError';
  }
}
