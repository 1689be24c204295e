import chalk from 'chalk';
import { OntologyError, ValidationError } from '../ontology/errors.js';

/**
 * Print an error in CLI style and exit with status 1.
 */
export function fail(error: unknown): never {
  if (error instanceof ValidationError) {
    console.log(chalk.red(`✗ Invalid ${error.entity}`));
    for (const issue of error.issues) {
      console.log(chalk.dim(`   ${issue.path}: `) + issue.message);
    }
  } else if (error instanceof OntologyError) {
    console.log(chalk.red(`✗ ${error.message}`) + chalk.dim(` (${error.code})`));
  } else {
    console.log(chalk.red(`✗ ${error instanceof Error ? error.message : String(error)}`));
  }
  console.log();
  process.exit(1);
}
