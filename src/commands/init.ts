/**
 * agentlog init: Write a default config to the current directory
 */

import chalk from 'chalk';
import ora from 'ora';
import { isInitialized, initializeProject, localConfigPath } from '../config.js';
import { listConnectors } from '../connectors/index.js';
import { fail } from '../cli/fail.js';

export async function initCommand(): Promise<void> {
  console.log();

  if (isInitialized()) {
    console.log(chalk.yellow('⚠  agentlog is already initialized in this directory.'));
    console.log(chalk.dim(`   Config: ${localConfigPath()}`));
    console.log();
    return;
  }

  const spinner = ora('Writing default configuration...').start();
  let format: string;
  try {
    const config = await initializeProject();
    format = config.connector.defaultFormat;
    spinner.succeed('Created .agentlog/config.json');
  } catch (err) {
    spinner.fail('Failed to initialize agentlog');
    fail(err);
  }

  console.log();
  console.log(chalk.green('✓ agentlog initialized'));
  console.log(chalk.dim(`  Default trace format: ${chalk.cyan(format)} (available: ${listConnectors().join(', ')})`));
  console.log();
  console.log(chalk.dim('  Next steps:'));
  console.log(chalk.dim(`  ${chalk.white('agentlog convert trace.json')}    Convert a trace to an ontology document`));
  console.log(chalk.dim(`  ${chalk.white('agentlog tree trace.json')}       Show the step tree`));
  console.log();
}
