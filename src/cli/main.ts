#!/usr/bin/env node

/**
 * first-reports CLI entry point.
 * Thin wrapper — all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerConvertCommand, registerFetchCommand, registerRunCommand } from './index.js';

const program = new Command();

program
  .name('first-reports')
  .description(
    'Download NHTSA FIRST crash reports for every state and convert them to simplified CSV tables.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerFetchCommand(program);
registerConvertCommand(program);

await program.parseAsync();
