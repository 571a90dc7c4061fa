/**
 * docqa ask command
 *
 * Answer a question from a corpus file with one of the workflows.
 *
 *   docqa ask "When are invoices sent?" --corpus handbook.yaml --mode search
 */

import chalk from 'chalk';
import ora from 'ora';
import {
  ValidationError,
  createContext,
  createLogger,
  loadConfig,
  runWithContext,
  setLogger,
} from '@docqa/core';
import { WORKFLOW_MODES, createWorkflow, isWorkflowMode, type FinalState } from '@docqa/engine';
import { buildCapabilities } from '../capabilities.js';
import { createProgressHook } from '../progress.js';

export interface AskOptions {
  corpus: string;
  mode: string;
  json?: boolean;
  maxIterations?: number;
  verbose?: boolean;
}

export async function askCommand(question: string, options: AskOptions): Promise<void> {
  const mode = options.mode;
  if (!isWorkflowMode(mode)) {
    throw new ValidationError(`Unknown mode: ${mode}`, {
      fieldErrors: { mode: `expected one of ${WORKFLOW_MODES.join(', ')}` },
    });
  }

  const config = loadConfig();
  const logger = createLogger('docqa-cli', {
    minSeverity: options.verbose ? config.logLevel : 'WARNING',
  });
  setLogger(logger);

  const spinner = ora({ isSilent: options.json });
  spinner.start('Loading corpus...');

  let result: FinalState;
  try {
    const capabilities = await buildCapabilities(config, options.corpus, logger);
    const workflow = createWorkflow(mode, capabilities, {
      ...config.workflow,
      maxIterations: options.maxIterations ?? config.workflow.maxIterations,
      hooks: [createProgressHook(spinner)],
      logger,
    });

    result = await runWithContext(createContext('cli', { mode }), () =>
      workflow.execute(question)
    );
  } catch (error) {
    spinner.fail('Workflow failed');
    throw error;
  }

  if (result.status === 'loop_limit') {
    spinner.warn(`Stopped after ${result.iterations} rewrite(s); showing the best available answer`);
  } else {
    spinner.succeed(`Answered with the ${mode} workflow`);
  }

  if (options.json) {
    console.log(JSON.stringify(result, null, 2));
    return;
  }

  console.log(formatResult(result, options.verbose ?? false));
}

/**
 * Render a result for the terminal
 */
export function formatResult(result: FinalState, verbose: boolean): string {
  const lines: string[] = [''];

  lines.push(`  ${result.answer}`);
  lines.push('');

  if (result.confidence !== undefined) {
    const percent = `${Math.round(result.confidence * 100)}%`;
    const color = result.confidence > 0.9 ? chalk.green : result.confidence > 0.5 ? chalk.yellow : chalk.red;
    lines.push(`  ${chalk.bold('Confidence:')} ${color(percent)}`);
  }

  if (result.question) {
    lines.push(`  ${chalk.bold('Question:')}   ${chalk.dim(result.question)}`);
  }

  if (result.suggestions && result.suggestions.length > 0) {
    lines.push('');
    lines.push(`  ${chalk.bold('Suggestions:')}`);
    for (const suggestion of result.suggestions) {
      lines.push(`    - ${suggestion}`);
    }
  }

  if (result.missingInfo && result.missingInfo.length > 0) {
    lines.push('');
    lines.push(`  ${chalk.bold('Missing information:')}`);
    for (const item of result.missingInfo) {
      lines.push(`    - ${item}`);
    }
  }

  if (verbose) {
    lines.push('');
    lines.push(`  ${chalk.bold('Path:')} ${chalk.dim(result.path.join(' -> '))}`);
    lines.push(`  ${chalk.bold('Sources:')}`);
    for (const doc of result.documents) {
      lines.push(`    - ${chalk.dim(doc.metadata.source ?? 'unknown')}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}
