import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { DatePlanRequest, FileConfig } from '../schema/index.js';
import { datePlanRequestSchema } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { createProviders, loadProviderConfig } from '../providers/index.js';
import type { Providers } from '../providers/index.js';
import { runPipeline } from '../core/pipeline.js';
import type { PipelineResult } from '../core/pipeline.js';
import {
  EXIT_CODES,
  exitCodeFor,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/index.js';
import { loadConfigFile, loadOptionalConfigFile, resolveSettings } from '../config/index.js';
import type { Settings } from '../config/index.js';
import * as log from '../utils/logger.js';

// ── Runtime wiring ───────────────────────────────────────────

interface Runtime {
  settings: Settings;
  providers: Providers;
  client?: LLMClient | undefined;
}

function buildClient(config: FileConfig): LLMClient | undefined {
  try {
    // Config-file provider and model win over the environment.
    const llmConfig = loadLLMConfig({
      ...process.env,
      ...(config.provider !== undefined ? { LLM_PROVIDER: config.provider } : {}),
      ...(config.model !== undefined ? { LLM_MODEL: config.model } : {}),
    });
    return createLLMClient(llmConfig);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    log.warn(`LLM unavailable, planning with the fallback only: ${message}`);
    return undefined;
  }
}

function buildRuntime(config: FileConfig): Runtime {
  return {
    settings: resolveSettings(config),
    providers: createProviders(loadProviderConfig()),
    client: buildClient(config),
  };
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(request: DatePlanRequest, result: PipelineResult): void {
  const { response, verification } = result;

  process.stderr.write(`\n--- Outing Plan ---\n`);
  process.stderr.write(`City:        ${request.city}\n`);
  process.stderr.write(`When:        ${request.dateTime}\n`);
  process.stderr.write(`Result:      ${response.success ? 'APPROVED' : 'NOT APPROVED'}\n`);
  if (verification) {
    process.stderr.write(
      `Confidence:  ${verification.confidenceScore.toFixed(2)} (${String(verification.issues.length)} issues)\n`,
    );
  }
  if (response.plan) {
    process.stderr.write(`Venues:      ${String(response.plan.venues.length)}\n`);
    process.stderr.write(`Budget:      ${response.plan.totalBudgetEstimate}\n`);
  }
  for (const e of response.errors) {
    process.stderr.write(`Error:       ${e}\n`);
  }
  process.stderr.write(`Time:        ${response.processingTimeSeconds.toFixed(2)}s\n`);
  process.stderr.write(`Plan ID:     ${response.planId}\n\n`);
}

// ── Single request ───────────────────────────────────────────

async function runRequest(
  request: DatePlanRequest,
  runtime: Runtime,
  outputDir: string,
  json: boolean,
): Promise<number> {
  const result = await runPipeline(request, runtime);

  await mkdir(outputDir, { recursive: true });
  await writeFile(
    path.join(outputDir, 'report.md'),
    generateMarkdown(request, result),
    'utf-8',
  );

  const output = serializeJSON(generateJSON(request, result));
  await writeFile(path.join(outputDir, 'response.json'), output + '\n', 'utf-8');

  if (json) {
    process.stdout.write(output + '\n');
  }

  printSummary(request, result);
  return exitCodeFor(result);
}

function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
  return items.length > 0 ? items : undefined;
}

// ── Plan command (single request from flags) ─────────────────

export function registerPlanCommand(program: Command): void {
  program
    .command('plan')
    .description('Plan one outing from command-line options')
    .requiredOption('--city <city>', 'City for the outing')
    .requiredOption('--date-time <text>', 'When, e.g. "Saturday 7pm" or "2024-02-10 19:00"')
    .option('--budget <amount>', 'Budget per person')
    .option('--preferences <text>', 'Cuisine, vibe, seating preferences')
    .option('--dietary <list>', 'Comma-separated dietary restrictions')
    .option('--accessibility <text>', 'Accessibility requirements')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory', '.artifacts')
    .option('--config <path>', 'Path to config file', '.outing.yaml')
    .option('--quiet', 'Only print warnings, errors and the summary')
    .action(
      async (opts: {
        city: string;
        dateTime: string;
        budget?: string;
        preferences?: string;
        dietary?: string;
        accessibility?: string;
        json?: true;
        reportPath: string;
        config: string;
        quiet?: true;
      }) => {
        log.setQuiet(opts.quiet === true);
        try {
          const parsed = datePlanRequestSchema.safeParse({
            city: opts.city,
            dateTime: opts.dateTime,
            budgetPerPerson: opts.budget !== undefined ? Number(opts.budget) : undefined,
            preferences: opts.preferences,
            dietaryRestrictions: splitList(opts.dietary),
            accessibilityNeeds: opts.accessibility,
          });
          if (!parsed.success) {
            process.stderr.write(`Invalid request: ${parsed.error.message}\n`);
            process.exitCode = EXIT_CODES.ERROR;
            return;
          }

          const config = await loadOptionalConfigFile(opts.config);
          const runtime = buildRuntime(config);

          process.exitCode = await runRequest(
            parsed.data,
            runtime,
            path.resolve(opts.reportPath),
            opts.json === true,
          );
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Error: ${message}\n`);
          process.exitCode = EXIT_CODES.ERROR;
        }
      },
    );
}

// ── Run command (config-driven batch) ────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Plan every request defined in a .outing.yaml config file')
    .option('--config <path>', 'Path to config file', '.outing.yaml')
    .option('--request <name>', 'Run a single request by name')
    .option('--json', 'Output JSON to stdout')
    .option('--report-path <dir>', 'Custom artifact directory', '.artifacts')
    .option('--quiet', 'Only print warnings, errors and the summary')
    .action(
      async (opts: {
        config: string;
        request?: string;
        json?: true;
        reportPath: string;
        quiet?: true;
      }) => {
        log.setQuiet(opts.quiet === true);
        let config: FileConfig;
        try {
          config = await loadConfigFile(opts.config);
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Config error: ${message}\n`);
          process.exitCode = EXIT_CODES.ERROR;
          return;
        }

        const requests =
          opts.request !== undefined
            ? config.requests.filter((r) => r.name === opts.request)
            : config.requests;

        if (requests.length === 0) {
          process.stderr.write(
            opts.request !== undefined
              ? `No request named "${opts.request}" found in config\n`
              : 'No requests defined in config\n',
          );
          process.exitCode = EXIT_CODES.ERROR;
          return;
        }

        const runtime = buildRuntime(config);
        let worstExitCode: number = EXIT_CODES.APPROVED;

        for (const { name, ...request } of requests) {
          process.stderr.write(`\nPlanning request: ${name}\n`);

          try {
            const exitCode = await runRequest(
              request,
              runtime,
              path.resolve(opts.reportPath, name),
              opts.json === true,
            );
            worstExitCode = Math.max(worstExitCode, exitCode);
          } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            process.stderr.write(`Error [${name}]: ${message}\n`);
            worstExitCode = EXIT_CODES.ERROR;
          }
        }

        process.exitCode = worstExitCode;
      },
    );
}
