/**
 * agentlog convert: Convert a trace into an ontology document
 */

import { writeFile } from 'node:fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig } from '../config.js';
import type { Run } from '../ontology/run.js';
import { serializeRun } from '../serializer/index.js';
import { convertTrace, readJsonFile } from '../cli/load.js';
import { fail } from '../cli/fail.js';

export interface ConvertOptions {
  /** Trace format (default: from config) */
  format?: string;
  /** Output file; stdout when absent */
  out?: string;
  /** Single-line JSON */
  compact?: boolean;
}

export async function convertCommand(tracePath: string, options: ConvertOptions): Promise<void> {
  const warnings: string[] = [];
  const spinner = options.out ? ora(`Converting ${tracePath}...`).start() : null;

  let run: Run;
  let text: string;
  try {
    const config = await loadConfig();
    const data = await readJsonFile(tracePath);
    run = convertTrace(data, config, {
      format: options.format,
      onWarning: (message) => warnings.push(message),
    });
    text = serializeRun(run, { indent: options.compact ? 0 : config.output.indent });
    if (options.out) {
      await writeFile(options.out, text + '\n', 'utf-8');
    }
  } catch (err) {
    spinner?.fail(`Failed to convert ${tracePath}`);
    fail(err);
  }

  if (!options.out) {
    // Document only on stdout so it can be piped
    for (const warning of warnings) {
      console.error(chalk.yellow(`⚠  ${warning}`));
    }
    console.log(text);
    return;
  }

  spinner?.succeed(`Wrote ${chalk.cyan(options.out)}`);
  for (const warning of warnings) {
    console.log(chalk.yellow(`  ⚠  ${warning}`));
  }
  console.log(
    chalk.dim(
      `  ${run.steps.length} step${run.steps.length === 1 ? '' : 's'}, ` +
        `${run.total_messages} messages, ${run.total_actions} actions, status ${run.status}`,
    ),
  );
  console.log();
}
