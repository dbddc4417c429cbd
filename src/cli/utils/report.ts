import chalk from 'chalk';
import type { ValidationFailure } from '../validators/common.js';
import { sortFailures } from '../validators/runner.js';
import { logger } from './logger.js';

export function formatOffendingParams(failure: ValidationFailure): string {
  return failure.offendingParams.map((p) => p.name).join(', ');
}

export function summarizeFailures(failures: readonly ValidationFailure[]): string {
  const errors = failures.filter((f) => f.level === 'ERROR').length;
  const warnings = failures.filter((f) => f.level === 'WARNING').length;
  const infos = failures.length - errors - warnings;
  return `${errors} error(s), ${warnings} warning(s), ${infos} info`;
}

/**
 * Prints every failure at once, most severe first, with the fields it concerns.
 */
export function printValidationReport(failures: readonly ValidationFailure[]): void {
  if (failures.length === 0) {
    logger.success('Configuration is valid');
    return;
  }

  console.log('\n' + chalk.bold('Validation failures:'));
  for (const failure of sortFailures(failures)) {
    logger.failure(failure.level, failure.validatorName, failure.message);
    const fields = formatOffendingParams(failure);
    if (fields) {
      console.log('  ' + chalk.gray(`field(s): ${fields}`));
    }
  }
  console.log('\n' + summarizeFailures(failures));
}
