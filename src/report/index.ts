/**
 * Report generation module.
 * Deterministic; no LLM calls.
 * Transforms pipeline results into markdown + JSON artifacts.
 */

export {
  EXIT_CODES,
  exitCodeFor,
  generateMarkdown,
  generateJSON,
  serializeJSON,
} from './reporter.js';
export type { JsonOutput } from './reporter.js';
