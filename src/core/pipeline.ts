import type { LLMClient } from '../llm/index.js';
import type {
  DatePlanResponse,
  ExecutionReport,
  Plan,
  VerificationReport,
} from '../schema/index.js';
import { datePlanRequestSchema } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import type { Settings } from '../config/settings.js';
import { DEFAULT_SETTINGS } from '../config/settings.js';
import type { Providers } from '../providers/client.js';
import * as log from '../utils/logger.js';
import { executePlan } from './executor.js';
import { planOuting } from './planner.js';
import { verifyPlan } from './verifier.js';

// ── Public types ─────────────────────────────────────────────

export interface PipelineDeps {
  providers: Providers;
  client?: LLMClient | undefined;
  settings?: Settings | undefined;
  now?: (() => Date) | undefined;
}

export interface PipelineResult {
  response: DatePlanResponse;
  plan?: Plan | undefined;
  execution?: ExecutionReport | undefined;
  verification?: VerificationReport | undefined;
  attempts: number;
}

// ── Helpers ──────────────────────────────────────────────────

function elapsedSeconds(started: number): number {
  return Math.round((Date.now() - started) / 10) / 100;
}

function criticalMessages(verification: VerificationReport): string[] {
  return verification.issues
    .filter((i) => i.severity === 'critical')
    .map((i) => i.message);
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Planner → Executor → Verifier, with one full re-run of the same plan when
 * the first verification rejects it. Never rejects: an invalid request or
 * an unexpected exception becomes an internal-error response.
 */
export async function runPipeline(
  input: unknown,
  deps: PipelineDeps,
): Promise<PipelineResult> {
  const started = Date.now();
  const settings = deps.settings ?? DEFAULT_SETTINGS;

  try {
    const request = datePlanRequestSchema.parse(input);

    log.section(`Planning: ${request.city}, ${request.dateTime}`);
    const plan = await planOuting(request, {
      client: deps.client,
      settings,
      now: deps.now,
    });

    log.section('Executing');
    let execution = await executePlan(plan, deps.providers);

    log.section('Verifying');
    const verifierOptions = { currencySymbol: settings.currencySymbol, now: deps.now };
    let verification = verifyPlan(plan, execution, request, verifierOptions);
    let attempts = 1;

    // The whole step set is re-run unchanged; recommendations are only logged.
    while (!verification.approved && attempts <= LIMITS.MAX_VERIFY_RETRIES) {
      log.warn(
        `Plan not approved, retry ${String(attempts)}/${String(LIMITS.MAX_VERIFY_RETRIES)}`,
      );
      for (const rec of verification.retryRecommendations) {
        log.detail(rec);
      }

      execution = await executePlan(plan, deps.providers);
      verification = verifyPlan(plan, execution, request, verifierOptions);
      attempts++;
    }

    const processingTimeSeconds = elapsedSeconds(started);

    if (verification.approved && verification.finalOutput) {
      log.info(`Plan ${plan.planId} ready in ${processingTimeSeconds.toFixed(2)}s`);
      return {
        response: {
          success: true,
          planId: plan.planId,
          message: 'Date plan created successfully!',
          plan: verification.finalOutput,
          errors: [],
          processingTimeSeconds,
        },
        plan,
        execution,
        verification,
        attempts,
      };
    }

    const errors = criticalMessages(verification);
    log.error(`No approved plan after ${String(attempts)} attempts`);
    return {
      response: {
        success: false,
        planId: plan.planId,
        message: 'Could not create a suitable date plan',
        errors: errors.length > 0 ? errors : ['Unable to find suitable venues or data'],
        processingTimeSeconds,
      },
      plan,
      execution,
      verification,
      attempts,
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Pipeline failed: ${message}`);
    return {
      response: {
        success: false,
        planId: 'error',
        message: 'Internal server error',
        errors: [message],
        processingTimeSeconds: elapsedSeconds(started),
      },
      attempts: 0,
    };
  }
}

/** Entry surface for callers that only need the response contract. */
export async function createDatePlan(
  input: unknown,
  deps: PipelineDeps,
): Promise<DatePlanResponse> {
  const { response } = await runPipeline(input, deps);
  return response;
}
