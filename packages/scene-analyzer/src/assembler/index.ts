export { assembleOutput } from './output-assembler';
export type { OutputParts } from './output-assembler';
