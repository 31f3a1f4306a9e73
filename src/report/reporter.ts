import type {
  DatePlanRequest,
  FinalPlan,
  VerificationReport,
} from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type { JsonOutput } from '../schema/jsonOutput.js';
import type { PipelineResult } from '../core/pipeline.js';

// Re-export contract types for consumers
export type { JsonOutput };

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  APPROVED: 0,
  NOT_APPROVED: 1,
  ERROR: 4,
} as const;

export function exitCodeFor(result: PipelineResult): number {
  if (result.response.success) return EXIT_CODES.APPROVED;
  return result.verification ? EXIT_CODES.NOT_APPROVED : EXIT_CODES.ERROR;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(
  request: Pick<DatePlanRequest, 'city' | 'dateTime'>,
  result: PipelineResult,
): JsonOutput {
  const { response, verification } = result;

  return {
    version: JSON_OUTPUT_VERSION,
    success: response.success,
    planId: response.planId,
    city: request.city,
    dateTime: request.dateTime,
    message: response.message,
    exitCode: exitCodeFor(result),
    processingTimeSeconds: response.processingTimeSeconds,
    ...(verification ? { confidenceScore: verification.confidenceScore } : {}),
    issues: (verification?.issues ?? []).map((i) => ({
      severity: i.severity,
      category: i.category,
      message: i.message,
    })),
    errors: response.errors,
    ...(response.plan ? { plan: response.plan } : {}),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  const sorted: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    sorted[k] = v;
  }
  return sorted;
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(
  request: Pick<DatePlanRequest, 'city' | 'dateTime'>,
  result: PipelineResult,
): string {
  const { response, verification } = result;
  const lines: string[] = [];

  lines.push(`# ${response.plan?.title ?? `Date Plan for ${request.city}`}`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **City** | ${escapeMarkdownCell(request.city)} |`);
  lines.push(`| **When** | ${escapeMarkdownCell(request.dateTime)} |`);
  lines.push(`| **Plan ID** | \`${response.planId}\` |`);
  lines.push(`| **Result** | ${response.success ? '[APPROVED]' : '[NOT APPROVED]'} |`);
  if (verification) {
    lines.push(`| **Confidence** | ${formatConfidence(verification.confidenceScore)} |`);
    lines.push(`| **Safety score** | ${String(verification.safetyCheck.safetyScore)}/10 |`);
  }
  lines.push(`| **Time** | ${response.processingTimeSeconds.toFixed(2)}s |`);
  lines.push('');

  if (response.plan) {
    lines.push(...planSections(response.plan));
  } else {
    lines.push(`## Errors`);
    lines.push('');
    for (const e of response.errors) {
      lines.push(`- ${e}`);
    }
    lines.push('');
  }

  if (verification) {
    lines.push(...issueSection(verification));
  }

  return lines.join('\n');
}

function planSections(plan: FinalPlan): string[] {
  const lines: string[] = [];

  lines.push(plan.summary);
  lines.push('');
  lines.push(`**Budget for two:** ${plan.totalBudgetEstimate}`);
  lines.push('');

  lines.push(`## Venues`);
  lines.push('');
  lines.push(`| # | Name | Rating | Price | Address |`);
  lines.push(`|---|------|--------|-------|---------|`);
  for (const [i, v] of plan.venues.entries()) {
    const rating = v.rating !== undefined ? v.rating.toFixed(1) : '-';
    const price = v.priceLevel !== undefined ? '$'.repeat(Math.max(1, v.priceLevel)) : '-';
    lines.push(
      `| ${String(i + 1)} | ${escapeMarkdownCell(v.name)} | ${rating} | ${price} | ${escapeMarkdownCell(v.address)} |`,
    );
  }
  lines.push('');

  if (plan.timeline.length > 0) {
    lines.push(`## Timeline`);
    lines.push('');
    for (const t of plan.timeline) {
      const duration = t.durationMinutes !== undefined ? ` (${String(t.durationMinutes)} min)` : '';
      const where = t.location ? ` @ ${t.location}` : '';
      lines.push(`- **${t.time}** ${t.activity}${where}${duration}`);
    }
    lines.push('');
  }

  if (plan.weatherForecast) {
    const w = plan.weatherForecast;
    lines.push(`## Weather`);
    lines.push('');
    lines.push(`${w.condition}, ${String(w.temperature)}°C (feels like ${String(w.feelsLike)}°C). ${w.suggestion}`);
    lines.push('');
  }

  lines.push(`## Safety Checklist`);
  lines.push('');
  for (const item of plan.safetyChecklist) {
    lines.push(`- [ ] ${item}`);
  }
  lines.push('');

  lines.push(`## Getting There`);
  lines.push('');
  for (const tip of plan.transportationSuggestions) {
    lines.push(`- ${tip}`);
  }
  lines.push('');

  if (plan.backupPlan) {
    lines.push(`## Backup Plan`);
    lines.push('');
    lines.push(plan.backupPlan);
    lines.push('');
  }

  if (plan.venueImages.length > 0) {
    lines.push(`## Inspiration`);
    lines.push('');
    for (const img of plan.venueImages) {
      lines.push(`![${img.description ?? 'photo'}](${img.url}) by ${img.photographer}`);
    }
    lines.push('');
  }

  return lines;
}

function issueSection(verification: VerificationReport): string[] {
  if (verification.issues.length === 0) return [];

  const lines: string[] = [`## Issues`, ''];
  for (const i of verification.issues) {
    const hint = i.suggestion ? ` (${i.suggestion})` : '';
    lines.push(`- [${i.severity.toUpperCase()}] ${i.category}: ${i.message}${hint}`);
  }
  lines.push('');
  return lines;
}

// ── Helpers ──────────────────────────────────────────────────

function formatConfidence(value: number): string {
  return `${String(Math.round(value * 100))}%`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
