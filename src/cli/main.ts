#!/usr/bin/env node

/**
 * shelfscan CLI entry point.
 * Thin wrapper, all logic delegated to core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import {
  registerDashboardCommand,
  registerInventoryCommand,
  registerOfferCommand,
  registerStatsCommand,
} from './run.js';

const program = new Command();

program
  .name('shelfscan')
  .description(
    'Scrape a marketplace seller store into a live dashboard and an accumulating CSV store.',
  )
  .version('0.1.0');

registerDashboardCommand(program);
registerInventoryCommand(program);
registerStatsCommand(program);
registerOfferCommand(program);

await program.parseAsync();
