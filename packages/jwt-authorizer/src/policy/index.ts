export { compilePolicy } from './compile.js';
export { MAX_NESTING_DEPTH } from './parser.js';
export { toPolicyValue } from './values.js';
export type { PolicyError, PolicyInput, PolicyProgram, PolicyValue } from './types.js';
