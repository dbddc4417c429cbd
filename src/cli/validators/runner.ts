import {
  compareFailureLevels,
  isFailureLevelAtLeast,
  type FailureLevel,
  type ValidationFailure,
  type Validator,
} from './common.js';

/**
 * A validator paired with its params. Build these with `entry` so the pairing
 * is type-checked before entries of different shapes share a list.
 */
export interface ValidatorEntry<P extends object = object> {
  validator: Validator<P>;
  params: P;
}

export function entry<P extends object>(validator: Validator<P>, params: P): ValidatorEntry {
  return { validator, params };
}

export interface RunOptions {
  /** `ALL`, or `type:<ValidatorName>` entries */
  suppress?: readonly string[];
}

export function isSuppressed(validatorName: string, suppress: readonly string[] = []): boolean {
  return suppress.some((rule) => rule === 'ALL' || rule === `type:${validatorName}`);
}

/**
 * Runs every entry to completion, one after another, and returns all failures
 * in the order they were reported.
 */
export async function runValidators(
  entries: readonly ValidatorEntry[],
  options: RunOptions = {},
): Promise<ValidationFailure[]> {
  const failures: ValidationFailure[] = [];

  for (const { validator, params } of entries) {
    if (isSuppressed(validator.name, options.suppress)) continue;
    failures.push(...(await validator.execute(params)));
  }

  return failures;
}

export function sortFailures(failures: readonly ValidationFailure[]): ValidationFailure[] {
  // Array.prototype.sort is stable, so reporting order is kept within a level
  return [...failures].sort((a, b) => compareFailureLevels(a.level, b.level));
}

export function hasBlockingFailures(
  failures: readonly ValidationFailure[],
  threshold: FailureLevel = 'ERROR',
): boolean {
  return failures.some((failure) => isFailureLevelAtLeast(failure.level, threshold));
}
