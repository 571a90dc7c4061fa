/**
 * docqa config command
 *
 * Show the effective configuration. Secrets are masked.
 */

import chalk from 'chalk';
import { loadConfig, redactConfig } from '@docqa/core';

export interface ConfigOptions {
  json?: boolean;
}

export async function configShowCommand(
  options: ConfigOptions,
  env: NodeJS.ProcessEnv = process.env
): Promise<void> {
  const config = redactConfig(loadConfig(env));

  if (options.json) {
    console.log(JSON.stringify(config, null, 2));
    return;
  }

  const unset = chalk.dim('Not set');

  console.log();
  console.log(chalk.bold('  Configuration'));
  console.log();

  // LLM
  console.log(chalk.bold('  LLM:'));
  console.log(`    Provider:             ${chalk.cyan(config.llm.provider)}`);
  console.log(`    Model:                ${config.llm.model ? chalk.cyan(config.llm.model) : chalk.dim('provider default')}`);
  console.log(`    API Key:              ${config.llm.apiKey ? chalk.green(config.llm.apiKey) : unset}`);
  if (config.llm.baseUrl) {
    console.log(`    Base URL:             ${chalk.dim(config.llm.baseUrl)}`);
  }
  console.log();

  // Web search
  console.log(chalk.bold('  Web Search:'));
  console.log(`    API Key:              ${config.webSearch.apiKey ? chalk.green(config.webSearch.apiKey) : unset}`);
  console.log(`    Results per query:    ${chalk.cyan(String(config.webSearch.maxResults))}`);
  console.log();

  // Workflow
  console.log(chalk.bold('  Workflow:'));
  console.log(`    Retrieve results:     ${chalk.cyan(String(config.workflow.nResults))}`);
  console.log(`    Rerank top K:         ${chalk.cyan(String(config.workflow.rerankTopK))}`);
  console.log(`    Confidence threshold: ${chalk.cyan(String(config.workflow.confidenceThreshold))}`);
  console.log(`    Max iterations:       ${chalk.cyan(String(config.workflow.maxIterations))}`);
  console.log(`    Max steps:            ${chalk.cyan(String(config.workflow.maxSteps))}`);
  console.log();

  console.log(`  Log level: ${chalk.dim(config.logLevel)}`);
  console.log();
}
