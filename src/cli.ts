#!/usr/bin/env node

/**
 * agentlog CLI
 *
 * Convert agent execution traces into the layered agent ontology and
 * inspect the result.
 *
 * Usage:
 *   agentlog init                       Write a default config
 *   agentlog convert <trace>            Convert a trace to an ontology document
 *   agentlog tree <file>                Print the step tree
 *   agentlog timeline <file>            Print start/end events in order
 *   agentlog metrics <file>             Print aggregate run metrics
 *   agentlog validate <document>        Check an ontology document
 */

import { Command } from 'commander';
import { createRequire } from 'node:module';
import {
  initCommand,
  convertCommand,
  treeCommand,
  timelineCommand,
  metricsCommand,
  validateCommand,
} from './commands/index.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const { version }: { version: string } = require('../package.json');

const program = new Command();

program
  .name('agentlog')
  .description('Convert agent execution traces into a layered agent ontology.')
  .version(version);

// ─── agentlog init ───────────────────────────────────────────

program
  .command('init')
  .description('Initialize agentlog in the current directory')
  .action(initCommand);

// ─── agentlog convert ────────────────────────────────────────

program
  .command('convert <trace>')
  .description('Convert a trace file into an ontology document')
  .option('-f, --format <format>', 'Trace format (default: from config)')
  .option('-o, --out <file>', 'Write the document to a file instead of stdout')
  .option('--compact', 'Write single-line JSON')
  .action(convertCommand);

// ─── agentlog tree ───────────────────────────────────────────

program
  .command('tree <file>')
  .description('Print the step tree of a trace or ontology document')
  .option('-f, --format <format>', 'Trace format (default: from config)')
  .action(treeCommand);

// ─── agentlog timeline ───────────────────────────────────────

program
  .command('timeline <file>')
  .description('Print step start/end events in chronological order')
  .option('-f, --format <format>', 'Trace format (default: from config)')
  .option('--json', 'Output as JSON')
  .action(timelineCommand);

// ─── agentlog metrics ────────────────────────────────────────

program
  .command('metrics <file>')
  .description('Print aggregate metrics for a run')
  .option('-f, --format <format>', 'Trace format (default: from config)')
  .option('--json', 'Output as JSON')
  .action(metricsCommand);

// ─── agentlog validate ───────────────────────────────────────

program
  .command('validate <document>')
  .description('Validate an ontology document')
  .action(validateCommand);

await program.parseAsync();
