#!/usr/bin/env node

/**
 * outing-planner CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerPlanCommand, registerRunCommand } from './index.js';

const program = new Command();

program
  .name('outing-planner')
  .description(
    'Plan a date or social outing: an LLM drafts the steps, providers fetch venues, weather and images, a verifier approves the result.',
  )
  .version('0.1.0');

registerPlanCommand(program);
registerRunCommand(program);

await program.parseAsync();
