import type {
  ExecutablePlan,
  ExecutableStep,
  ExecutionReport,
  PlanAction,
  StepParams,
  StepResult,
  StepStatus,
} from '../schema/index.js';
import { computeOverallStatus, isPlanAction } from '../schema/index.js';
import { STEP_DEFAULTS } from '../config/defaults.js';
import type { Providers } from '../providers/client.js';
import * as log from '../utils/logger.js';

// ── Constants ────────────────────────────────────────────────

const EXECUTOR_SOURCE = 'executor';
const EVENTS_SOURCE = 'events_placeholder';

// ── Param readers ────────────────────────────────────────────
// LLM-written params are loosely typed; numeric strings are accepted.

function numberParam(params: StepParams, key: string, fallback: number): number {
  const value = params[key];
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) return parsed;
  }
  return fallback;
}

function stringParam(params: StepParams, key: string, fallback: string): string {
  const value = params[key];
  return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

function optionalStringParam(params: StepParams, key: string): string | undefined {
  const value = params[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

// ── Result builder ───────────────────────────────────────────

function stepResult(
  step: ExecutableStep,
  status: StepStatus,
  source: string,
  payload: Record<string, unknown>,
  errorMessage?: string,
): StepResult {
  return {
    stepId: step.id,
    action: step.action,
    status,
    payload,
    source,
    ...(errorMessage !== undefined ? { errorMessage } : {}),
    timestamp: new Date().toISOString(),
  };
}

// ── Handlers ─────────────────────────────────────────────────

type StepHandler = (step: ExecutableStep, providers: Providers) => Promise<StepResult>;

const fetchWeather: StepHandler = async (step, { weather }) => {
  const forecast = await weather.getForecast(
    numberParam(step.params, 'latitude', 0),
    numberParam(step.params, 'longitude', 0),
    optionalStringParam(step.params, 'target_datetime'),
  );

  if (forecast) {
    return stepResult(step, 'success', weather.source, forecast);
  }
  return stepResult(step, 'failed', weather.source, {}, 'Failed to fetch weather data');
};

const searchVenues: StepHandler = async (step, { venues: provider }) => {
  const venues = await provider.searchVenues({
    query: stringParam(step.params, 'query', STEP_DEFAULTS.VENUE_QUERY),
    latitude: numberParam(step.params, 'latitude', 0),
    longitude: numberParam(step.params, 'longitude', 0),
    radius: numberParam(step.params, 'radius', STEP_DEFAULTS.VENUE_RADIUS),
    venueType: stringParam(step.params, 'venue_type', STEP_DEFAULTS.VENUE_TYPE),
    maxResults: numberParam(step.params, 'max_results', STEP_DEFAULTS.VENUE_MAX_RESULTS),
  });

  if (venues.length > 0) {
    return stepResult(step, 'success', provider.source, { venues });
  }
  return stepResult(
    step,
    'partial',
    provider.source,
    { venues: [] },
    'No venues found matching criteria',
  );
};

const checkEvents: StepHandler = async (step) =>
  stepResult(
    step,
    'success',
    EVENTS_SOURCE,
    { events: [] },
    'Events API not integrated (placeholder)',
  );

const fetchImages: StepHandler = async (step, { images: provider }) => {
  const images = await provider.searchImages(
    stringParam(step.params, 'query', STEP_DEFAULTS.IMAGE_QUERY),
    numberParam(step.params, 'count', STEP_DEFAULTS.IMAGE_COUNT),
  );

  if (images.length > 0) {
    return stepResult(step, 'success', provider.source, { images });
  }
  return stepResult(step, 'partial', provider.source, { images: [] }, 'No images found');
};

const composeFinal: StepHandler = async (step) =>
  stepResult(step, 'success', EXECUTOR_SOURCE, { readyForComposition: true });

const HANDLERS = {
  fetch_weather: fetchWeather,
  search_venues: searchVenues,
  check_events: checkEvents,
  fetch_images: fetchImages,
  compose_final: composeFinal,
} satisfies Record<PlanAction, StepHandler>;

// ── Single step ──────────────────────────────────────────────

/**
 * Run one step. Never rejects: unknown actions and provider exceptions
 * both come back as `failed` results.
 */
export async function executeStep(
  step: ExecutableStep,
  providers: Providers,
): Promise<StepResult> {
  if (!isPlanAction(step.action)) {
    return stepResult(
      step,
      'failed',
      EXECUTOR_SOURCE,
      {},
      `Unknown action: ${step.action}`,
    );
  }

  try {
    return await HANDLERS[step.action](step, providers);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Step ${step.id} threw: ${message}`);
    return stepResult(step, 'failed', EXECUTOR_SOURCE, {}, message);
  }
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Execute the plan's steps strictly in order. With `retryStepIds`, only
 * those steps run, still in plan order.
 */
export async function executePlan(
  plan: ExecutablePlan,
  providers: Providers,
  retryStepIds?: readonly string[],
): Promise<ExecutionReport> {
  const started = Date.now();

  const selected = retryStepIds
    ? plan.steps.filter((s) => retryStepIds.includes(s.id))
    : plan.steps;

  log.info(
    retryStepIds
      ? `Executor retrying ${String(selected.length)} of ${String(plan.steps.length)} steps`
      : `Executor running ${String(selected.length)} steps for ${plan.planId}`,
  );

  const results: StepResult[] = [];
  for (const [index, step] of selected.entries()) {
    const result = await executeStep(step, providers);
    results.push(result);

    const suffix = result.errorMessage ? `: ${result.errorMessage}` : '';
    log.stepResult(index, selected.length, result.status, `${step.id} ${step.action}${suffix}`);
  }

  const overallStatus = computeOverallStatus(results);
  const executionTimeSeconds = Math.round((Date.now() - started) / 10) / 100;

  log.detail(`Execution ${overallStatus} in ${executionTimeSeconds.toFixed(2)}s`);

  return {
    planId: plan.planId,
    results,
    overallStatus,
    executionTimeSeconds,
  };
}
