/**
 * agentlog validate: Check an ontology document against the schema
 */

import { readFile } from 'node:fs/promises';
import chalk from 'chalk';
import type { Run } from '../ontology/run.js';
import { deserializeRun } from '../serializer/index.js';
import { maxNestingDepth, walkSteps } from '../ontology/step-tree.js';
import { fail } from '../cli/fail.js';

export async function validateCommand(file: string): Promise<void> {
  console.log();

  let run: Run;
  try {
    run = deserializeRun(await readFile(file, 'utf-8'));
  } catch (err) {
    fail(err);
  }

  const stepCount = [...walkSteps(run)].length;
  console.log(chalk.green(`✓ Valid ontology document: ${run.id}`));
  console.log(
    chalk.dim(`  ${stepCount} step${stepCount === 1 ? '' : 's'}, nesting depth ${maxNestingDepth(run)}, status ${run.status}`),
  );
  console.log();
}
