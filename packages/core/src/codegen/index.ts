/**
 * Code Generation Module
 */

export {
  DEFAULT_RUNTIME_MODULE,
  generateLexerModule,
  type GenerateOptions,
} from './module.js';
export { writeTransitionProcedure } from './procedure.js';
export { CodeWriter } from './writer.js';
