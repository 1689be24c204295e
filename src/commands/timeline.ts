/**
 * agentlog timeline: Chronological start/end events of every step
 */

import chalk from 'chalk';
import { loadConfig } from '../config.js';
import type { Run } from '../ontology/run.js';
import { timeline } from '../ontology/step-tree.js';
import { formatTimestamp } from '../ontology/timestamp.js';
import { loadRun } from '../cli/load.js';
import { fail } from '../cli/fail.js';

export interface TimelineOptions {
  json?: boolean;
  format?: string;
}

export async function timelineCommand(file: string, options: TimelineOptions = {}): Promise<void> {
  let run: Run;
  try {
    const config = await loadConfig();
    run = await loadRun(file, config, { format: options.format });
  } catch (err) {
    fail(err);
  }

  const events = timeline(run);

  if (options.json) {
    const serialized = events.map((event) => ({ ...event, timestamp: formatTimestamp(event.timestamp) }));
    console.log(JSON.stringify(serialized, null, 2));
    return;
  }

  console.log();
  console.log(chalk.bold(`🕒 Timeline: ${chalk.cyan(run.id)}`));
  console.log(chalk.dim(`   ${events.length} event${events.length === 1 ? '' : 's'}`));
  console.log();

  for (const event of events) {
    const marker = event.type === 'step_start' ? chalk.green('▶') : chalk.red('■');
    console.log(
      `  ${chalk.cyan(formatTimestamp(event.timestamp))}  ${'  '.repeat(event.depth)}${marker} ` +
        `${event.step_name} ${chalk.dim(event.step_id)}`,
    );
  }
  console.log();
}
