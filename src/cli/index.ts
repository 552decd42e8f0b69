#!/usr/bin/env node

import chalk from 'chalk';
import { createProgram } from './cli.js';

process.on('SIGINT', () => {
  console.log();
  console.log(chalk.yellow('Operation cancelled by user'));
  process.exit(130);
});

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
    process.exit(1);
  });
