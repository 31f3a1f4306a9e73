/**
 * Core orchestration module.
 * Coordinates planner → executor → verifier pipeline.
 * No CLI and no direct HTTP; providers and the LLM are injected.
 */

export {
  planOuting,
  buildPlanningContext,
  buildFallbackDraft,
  createLLMStrategy,
  fallbackStrategy,
  PlannerError,
} from './planner.js';
export type {
  PlannerOptions,
  PlanningContext,
  PlanningStrategy,
  PlanDraft,
} from './planner.js';
export { executePlan, executeStep } from './executor.js';
export { verifyPlan, extractResults } from './verifier.js';
export type { VerifierOptions, ExtractedResults } from './verifier.js';
export { composeFinalPlan } from './compose.js';
export { runPipeline, createDatePlan } from './pipeline.js';
export type { PipelineDeps, PipelineResult } from './pipeline.js';
export {
  generatePlanId,
  parseDateTime,
  priceBracket,
  resolveCity,
} from './requestContext.js';
export type { ParsedDateTime } from './requestContext.js';

// ── Library surface ──────────────────────────────────────────

export {
  EXIT_CODES,
  exitCodeFor,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/index.js';
export type { JsonOutput } from '../report/index.js';
export { ConfigError, resolveSettings } from '../config/index.js';
export type { Settings } from '../config/index.js';
export { createProviders, loadProviderConfig } from '../providers/index.js';
export type { Providers } from '../providers/index.js';
