export {
  CoordinateSpaceError,
  ModelInvocationError,
  SceneAnalysisError,
} from './scene-analysis-error';
export {
  IncompleteOutputError,
  InvalidConfidenceError,
  InvalidEnumValueError,
  MalformedResponseError,
  ModelOutputError,
} from './model-output-error';
export type { ModelOutputErrorKind, SubQuery } from './model-output-error';
export { ResponseParsingError } from './response-parsing-error';
export type { ResponseGrammar } from './response-parsing-error';
