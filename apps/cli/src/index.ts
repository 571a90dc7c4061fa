#!/usr/bin/env node

/**
 * docqa CLI
 *
 * Grounded question answering over a private corpus.
 *
 * Commands:
 *   docqa ask <question> --corpus <file>   Answer a question
 *   docqa graph [mode]                     Show a workflow graph
 *   docqa config                           Show effective configuration
 *
 * Configuration comes from environment variables (see `docqa config`).
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { ValidationError, toExitCode } from '@docqa/core';
import { askCommand, type AskOptions } from './commands/ask.js';
import { graphCommand } from './commands/graph.js';
import { configShowCommand, type ConfigOptions } from './commands/config.js';

function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

function handleError(error: unknown): never {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : String(error));
  if (error instanceof ValidationError && error.fieldErrors) {
    for (const [field, message] of Object.entries(error.fieldErrors)) {
      console.error(chalk.dim(`  ${field}: ${message}`));
    }
  }
  process.exit(toExitCode(error));
}

const program = new Command();

program
  .name('docqa')
  .description('docqa - grounded question answering over a private corpus')
  .version('0.1.0');

program
  .command('ask <question>')
  .description('Answer a question from a corpus file')
  .requiredOption('-c, --corpus <file>', 'Corpus file (.json, .yaml, .yml, .md, .txt)')
  .option('-m, --mode <mode>', 'Workflow: basic, suggestion or search', 'suggestion')
  .option('--max-iterations <n>', 'Rewrite loop bound', parseCount)
  .option('-v, --verbose', 'Show path, sources and logs')
  .option('--json', 'Output the final state as JSON')
  .action(async (question: string, options: AskOptions) => {
    try {
      await askCommand(question, options);
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('graph [mode]')
  .description('Show the nodes and edges of a workflow')
  .action(async (mode: string | undefined) => {
    try {
      await graphCommand(mode ?? 'search');
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('config')
  .description('Show effective configuration with secrets masked')
  .option('--json', 'Output as JSON')
  .action(async (options: ConfigOptions) => {
    try {
      await configShowCommand(options);
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync().catch(handleError);
