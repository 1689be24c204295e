/**
 * agentlog metrics: Aggregate metrics of a run
 */

import chalk from 'chalk';
import { loadConfig } from '../config.js';
import type { Run } from '../ontology/run.js';
import { calculateMetrics } from '../ontology/step-tree.js';
import { loadRun } from '../cli/load.js';
import { fail } from '../cli/fail.js';

export interface MetricsOptions {
  json?: boolean;
  format?: string;
}

export async function metricsCommand(file: string, options: MetricsOptions = {}): Promise<void> {
  let run: Run;
  try {
    const config = await loadConfig();
    run = await loadRun(file, config, { format: options.format });
  } catch (err) {
    fail(err);
  }

  const metrics = calculateMetrics(run);
  const counters = {
    total_observations: run.total_observations,
    total_actions: run.total_actions,
    total_messages: run.total_messages,
  };

  if (options.json) {
    console.log(JSON.stringify({ ...metrics, ...counters }, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`📊 Metrics: ${chalk.cyan(run.id)}`));
  console.log();

  const rows = Object.entries({ ...metrics, ...counters });
  const width = Math.max(...rows.map(([name]) => name.length));
  for (const [name, value] of rows) {
    console.log(`  ${chalk.dim(name.padEnd(width))}  ${Number.isInteger(value) ? value : value.toFixed(3)}`);
  }
  console.log();
}
