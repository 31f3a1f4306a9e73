/**
 * Pipeline progress logger.
 *
 * Writes to stderr so stdout carries nothing but `--json` output.
 * Quiet mode drops progress lines; warnings and errors always print.
 */

import type { StepStatus } from '../schema/execution.js';

let quiet = false;

export function setQuiet(value: boolean): void {
  quiet = value;
}

function emit(message: string): void {
  process.stderr.write(message + '\n');
}

function progress(message: string): void {
  if (!quiet) emit(message);
}

// ── General ─────────────────────────────────────────────────

export function info(message: string): void {
  progress(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  progress(`   ${message}`);
}

export function section(title: string): void {
  const rule = '─'.repeat(50);
  progress(`\n${rule}\n▶  ${title}\n${rule}`);
}

export function warn(message: string): void {
  emit(`⚠️  ${message}`);
}

export function error(message: string): void {
  emit(`💥 ${message}`);
}

// ── Pipeline stages ─────────────────────────────────────────

export function llm(message: string): void {
  progress(`🧠 ${message}`);
}

export function planned(stepCount: number, strategy: string): void {
  progress(`🗺️  Plan (${strategy}): ${String(stepCount)} steps`);
}

const STATUS_ICONS: Record<StepStatus, string> = {
  success: '✅',
  partial: '🟡',
  failed: '❌',
};

export function stepResult(
  index: number,
  total: number,
  status: StepStatus,
  description: string,
): void {
  progress(`${STATUS_ICONS[status]} [${String(index + 1)}/${String(total)}] ${description}`);
}

export function verdict(approved: boolean, confidence: number): void {
  const label = approved ? '✅ approved' : '❌ rejected';
  progress(`🔎 Verifier: ${label}, confidence ${confidence.toFixed(2)}`);
}
