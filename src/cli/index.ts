export { createProgram, main, runGenerate } from './program';
export type { Logger, GenerateResult } from './program';
