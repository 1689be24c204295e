/**
 * agentlog tree: Print the step tree of a run
 */

import chalk from 'chalk';
import { loadConfig } from '../config.js';
import type { Run } from '../ontology/run.js';
import { walkSteps } from '../ontology/step-tree.js';
import { loadRun } from '../cli/load.js';
import { describeStep, formatSeconds } from '../cli/render.js';
import { fail } from '../cli/fail.js';

export interface TreeOptions {
  format?: string;
}

export async function treeCommand(file: string, options: TreeOptions = {}): Promise<void> {
  let run: Run;
  try {
    const config = await loadConfig();
    run = await loadRun(file, config, { format: options.format });
  } catch (err) {
    fail(err);
  }

  console.log();
  console.log(chalk.bold(`🌳 ${run.name}`) + chalk.dim(`  ${run.status}`));
  console.log(chalk.dim(`   Agent: ${run.agent.name} [${run.agent.types.join(', ')}]`));
  if (run.duration !== null) {
    console.log(chalk.dim(`   Duration: ${formatSeconds(run.duration)}`));
  }
  console.log();

  if (run.steps.length === 0) {
    console.log(chalk.dim('  No steps recorded.'));
    console.log();
    return;
  }

  for (const { step, depth } of walkSteps(run)) {
    const indent = '  '.repeat(depth + 1);
    console.log(`${indent}${chalk.yellow(step.name)} ${chalk.cyan(step.id)}`);
    for (const detail of describeStep(step)) {
      console.log(`${indent}  ${chalk.dim(detail)}`);
    }
  }
  console.log();
}
