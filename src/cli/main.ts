#!/usr/bin/env node

/**
 * pageline CLI entry point.
 * Thin wrapper; all logic is delegated to the workflow and core modules.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerReadmeCommand, registerRunCommand } from './run.js';

const program = new Command();

program
  .name('pageline')
  .description(
    'Drive one Playwright session through a serialized worker and turn captured component catalogs into READMEs.',
  )
  .version('0.1.0');

registerRunCommand(program);
registerReadmeCommand(program);

await program.parseAsync();
