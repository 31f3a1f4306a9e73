import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import type { LLMClient } from '../llm/index.js';
import type {
  CityCoordinates,
  DatePlanRequest,
  Plan,
  PlanStep,
  PlannerResponse,
} from '../schema/index.js';
import { plannerResponseSchema } from '../schema/index.js';
import { FALLBACK_SAFETY_NOTES, STEP_DEFAULTS } from '../config/defaults.js';
import type { Settings } from '../config/settings.js';
import { DEFAULT_SETTINGS } from '../config/settings.js';
import * as log from '../utils/logger.js';
import type { ParsedDateTime } from './requestContext.js';
import {
  generatePlanId,
  parseDateTime,
  priceBracket,
  resolveCity,
} from './requestContext.js';

// ── Public types ─────────────────────────────────────────────

export interface PlanningContext {
  request: DatePlanRequest;
  coordinates: CityCoordinates;
  priceLevel: number;
  when: ParsedDateTime;
  currencySymbol: string;
}

export interface PlanDraft {
  userIntent: string;
  steps: PlanStep[];
  estimatedBudget?: number | undefined;
  safetyNotes: string[];
}

export interface PlanningStrategy {
  readonly name: string;
  draft(context: PlanningContext): Promise<PlanDraft>;
}

export interface PlannerOptions {
  client?: LLMClient | undefined;
  settings?: Settings | undefined;
  now?: (() => Date) | undefined;
}

// ── Error ────────────────────────────────────────────────────

export class PlannerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlannerError';
  }
}

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

// ── Context ──────────────────────────────────────────────────

export function buildPlanningContext(
  request: DatePlanRequest,
  settings: Settings = DEFAULT_SETTINGS,
): PlanningContext {
  return {
    request,
    coordinates: resolveCity(request.city, settings.cities),
    priceLevel: priceBracket(request.budgetPerPerson, settings.priceBrackets),
    when: parseDateTime(request.dateTime),
    currencySymbol: settings.currencySymbol,
  };
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Turn a request into a Plan. Tries the LLM strategy when a client is
 * given and drops to the deterministic fallback on any failure, so this
 * never rejects for planning reasons.
 */
export async function planOuting(
  request: DatePlanRequest,
  options: PlannerOptions = {},
): Promise<Plan> {
  const planId = generatePlanId(options.now?.() ?? new Date());
  const context = buildPlanningContext(request, options.settings);

  log.llm(`Planner analyzing request for ${request.city}`);

  let strategy: PlanningStrategy = fallbackStrategy;
  let draft: PlanDraft | undefined;

  if (options.client) {
    const llmStrategy = createLLMStrategy(options.client);
    try {
      draft = await llmStrategy.draft(context);
      strategy = llmStrategy;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.warn(`LLM planning failed, using fallback plan: ${message}`);
    }
  }

  draft ??= await fallbackStrategy.draft(context);
  log.planned(draft.steps.length, strategy.name);
  for (const [i, step] of draft.steps.entries()) {
    log.detail(`${String(i + 1)}. [${step.action}] ${step.reasoning ?? step.id}`);
  }

  return {
    planId,
    userIntent: draft.userIntent,
    steps: draft.steps,
    ...(draft.estimatedBudget !== undefined
      ? { estimatedBudget: draft.estimatedBudget }
      : {}),
    safetyNotes: draft.safetyNotes,
  };
}

// ── LLM strategy ─────────────────────────────────────────────

export function createLLMStrategy(client: LLMClient): PlanningStrategy {
  return {
    name: 'llm',

    async draft(context) {
      const systemPrompt = await buildSystemPrompt(context);
      const userPrompt = `Plan a date in ${context.request.city} for ${context.request.dateTime}.`;
      log.llm(`Asking ${client.model} for a plan`);
      const raw = await client.generate(systemPrompt, userPrompt, { json: true });

      const parsed = tryParse(raw);
      if (!parsed.ok) {
        throw new PlannerError(`Unusable planner response: ${parsed.error}`);
      }

      const response = parsed.response;
      return {
        userIntent: response.user_intent,
        steps: response.steps,
        estimatedBudget:
          response.estimated_budget ?? context.request.budgetPerPerson,
        safetyNotes: response.safety_notes,
      };
    },
  };
}

// ── Fallback strategy ────────────────────────────────────────

export function buildFallbackDraft(context: PlanningContext): PlanDraft {
  const { lat, lon } = context.coordinates;
  const preferences = context.request.preferences?.trim();

  return {
    userIntent: `Plan a date in ${context.request.city}`,
    steps: [
      {
        id: 'step_1',
        action: 'fetch_weather',
        params: { latitude: lat, longitude: lon, target_datetime: null },
        reasoning: 'Check weather conditions for the date',
      },
      {
        id: 'step_2',
        action: 'search_venues',
        params: {
          query: preferences
            ? `${preferences} ${STEP_DEFAULTS.VENUE_QUERY}`
            : STEP_DEFAULTS.VENUE_QUERY,
          latitude: lat,
          longitude: lon,
          radius: STEP_DEFAULTS.VENUE_RADIUS,
          venue_type: STEP_DEFAULTS.VENUE_TYPE,
          max_results: STEP_DEFAULTS.VENUE_MAX_RESULTS,
        },
        reasoning: 'Find suitable dining venues',
      },
      {
        id: 'step_3',
        action: 'fetch_images',
        params: {
          query: STEP_DEFAULTS.FALLBACK_IMAGE_QUERY,
          count: STEP_DEFAULTS.IMAGE_COUNT,
        },
        reasoning: 'Get inspirational images',
      },
      {
        id: 'step_4',
        action: 'compose_final',
        params: { include_timeline: true, include_backup_plan: true },
        reasoning: 'Compose final date plan',
      },
    ],
    estimatedBudget: context.request.budgetPerPerson,
    safetyNotes: [...FALLBACK_SAFETY_NOTES],
  };
}

export const fallbackStrategy: PlanningStrategy = {
  name: 'fallback',
  async draft(context) {
    return buildFallbackDraft(context);
  },
};

// ── Template rendering ───────────────────────────────────────

export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) =>
    values[key] ?? match,
  );
}

export function promptValues(context: PlanningContext): Record<string, string> {
  const { request, coordinates, when } = context;
  const budget = request.budgetPerPerson;
  const dietary = request.dietaryRestrictions ?? [];

  return {
    city: request.city,
    latitude: String(coordinates.lat),
    longitude: String(coordinates.lon),
    budget: budget !== undefined ? `${context.currencySymbol}${String(budget)}` : 'flexible',
    priceLevel: String(context.priceLevel),
    dateTime: request.dateTime,
    parsedDateTime: JSON.stringify({ day: when.day, date: when.date, time: when.time }),
    preferences: request.preferences?.trim() || 'casual, nice ambience',
    dietary: dietary.length > 0 ? dietary.join(', ') : 'none specified',
    accessibility: request.accessibilityNeeds?.trim() || 'none',
    estimatedBudget: String(budget ?? 1500),
  };
}

async function buildSystemPrompt(context: PlanningContext): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'planner.txt'),
    'utf-8',
  );
  return renderTemplate(template, promptValues(context));
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; response: PlannerResponse }
  | { ok: false; error: string };

function tryParse(raw: string): ParseResult {
  const json = stripCodeFence(raw);

  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: `Invalid JSON: ${message}` };
  }

  const result = plannerResponseSchema.safeParse(parsed);
  if (!result.success) {
    return { ok: false, error: result.error.message };
  }

  return { ok: true, response: result.data };
}

export function stripCodeFence(raw: string): string {
  const trimmed = raw.trim();
  const fenced = /^```(?:json)?\s*\n?([\s\S]*?)```/.exec(trimmed);
  if (fenced?.[1] !== undefined) return fenced[1].trim();
  return trimmed;
}
