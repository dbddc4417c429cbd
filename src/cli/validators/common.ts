export const FAILURE_LEVELS = ['INFO', 'WARNING', 'ERROR'] as const;

export type FailureLevel = (typeof FAILURE_LEVELS)[number];

const SEVERITY: Record<FailureLevel, number> = {
  INFO: 10,
  WARNING: 30,
  ERROR: 40,
};

export function failureLevelSeverity(level: FailureLevel): number {
  return SEVERITY[level];
}

/**
 * Orders levels from most to least severe, so ERROR sorts first.
 */
export function compareFailureLevels(a: FailureLevel, b: FailureLevel): number {
  return SEVERITY[b] - SEVERITY[a];
}

export function isFailureLevelAtLeast(level: FailureLevel, threshold: FailureLevel): boolean {
  return SEVERITY[level] >= SEVERITY[threshold];
}

export function isFailureLevel(value: string): value is FailureLevel {
  return FAILURE_LEVELS.some((level) => level === value);
}

export interface Param<T = unknown> {
  readonly name: string;
  readonly value: T;
}

export function param<T>(name: string, value: T): Param<T> {
  return Object.freeze({ name, value });
}

export interface ValidationFailure {
  readonly message: string;
  readonly level: FailureLevel;
  readonly validatorName: string;
  readonly offendingParams: readonly Param[];
}

/**
 * Outcome of a lookup against an external collaborator (EC2, S3, ...).
 * `not-found` is reserved for faults the user can act on directly.
 */
export type LookupResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'not-found'; message: string }
  | { kind: 'error'; message: string };

export type FailureReporter = (
  message: string,
  level: FailureLevel,
  offendingParams?: readonly Param[],
) => void;

/**
 * A single semantic rule over a fixed set of named params.
 *
 * Subclasses implement `check`, reporting each violation through `report`.
 * `execute` collects into a fresh list on every call and never touches the params.
 */
export abstract class Validator<P extends object> {
  abstract readonly name: string;

  protected abstract check(params: P, report: FailureReporter): void | Promise<void>;

  async execute(params: P): Promise<readonly ValidationFailure[]> {
    const failures: ValidationFailure[] = [];
    await this.check(params, (message, level, offendingParams = []) => {
      failures.push(
        Object.freeze({
          message,
          level,
          validatorName: this.name,
          offendingParams: Object.freeze([...offendingParams]),
        }),
      );
    });
    return Object.freeze(failures);
  }
}
