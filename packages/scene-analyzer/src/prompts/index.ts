export {
  DEFAULT_DRIVING_PROMPTS,
  buildJsonPrompt,
  buildLinePrompt,
  buildMultiCallPrompts,
  buildScenePrompt,
  resolvePrompts,
} from './driving-prompts';
export type {
  DrivingPromptOverrides,
  DrivingPrompts,
} from './driving-prompts';
