import { describe, it, expect } from 'vitest';
import { Validator, param, type FailureLevel, type FailureReporter, type Param } from '../../src/cli/validators/common.js';
import {
  entry,
  hasBlockingFailures,
  isSuppressed,
  runValidators,
  sortFailures,
} from '../../src/cli/validators/runner.js';

class FixedValidator extends Validator<{ field: Param<string> }> {
  constructor(
    readonly name: string,
    private readonly level: FailureLevel,
  ) {
    super();
  }

  protected check({ field }: { field: Param<string> }, report: FailureReporter): void {
    report(`${this.name} on ${field.value}`, this.level, [field]);
  }
}

const warning = new FixedValidator('WarnValidator', 'WARNING');
const error = new FixedValidator('ErrorValidator', 'ERROR');
const info = new FixedValidator('InfoValidator', 'INFO');

describe('runValidators', () => {
  it('collects failures from every validator in order', async () => {
    const failures = await runValidators([
      entry(warning, { field: param('A', 'a') }),
      entry(error, { field: param('B', 'b') }),
    ]);

    expect(failures.map((f) => f.message)).toEqual(['WarnValidator on a', 'ErrorValidator on b']);
  });

  it('skips suppressed validators by type', async () => {
    const failures = await runValidators(
      [entry(warning, { field: param('A', 'a') }), entry(error, { field: param('B', 'b') })],
      { suppress: ['type:ErrorValidator'] },
    );

    expect(failures.map((f) => f.validatorName)).toEqual(['WarnValidator']);
  });

  it('skips everything with ALL', async () => {
    const failures = await runValidators([entry(error, { field: param('B', 'b') })], { suppress: ['ALL'] });
    expect(failures).toEqual([]);
  });
});

describe('isSuppressed', () => {
  it('matches only exact type rules', () => {
    expect(isSuppressed('UrlValidator', ['type:UrlValidator'])).toBe(true);
    expect(isSuppressed('UrlValidator', ['UrlValidator'])).toBe(false);
    expect(isSuppressed('UrlValidator')).toBe(false);
  });
});

describe('sortFailures', () => {
  it('puts the most severe first and keeps order within a level', async () => {
    const failures = await runValidators([
      entry(info, { field: param('A', '1') }),
      entry(warning, { field: param('A', '2') }),
      entry(error, { field: param('A', '3') }),
      entry(warning, { field: param('A', '4') }),
    ]);

    expect(sortFailures(failures).map((f) => f.message)).toEqual([
      'ErrorValidator on 3',
      'WarnValidator on 2',
      'WarnValidator on 4',
      'InfoValidator on 1',
    ]);
  });
});

describe('hasBlockingFailures', () => {
  it('blocks on failures at or above the threshold', async () => {
    const warnings = await runValidators([entry(warning, { field: param('A', 'a') })]);

    expect(hasBlockingFailures(warnings)).toBe(false);
    expect(hasBlockingFailures(warnings, 'WARNING')).toBe(true);
    expect(hasBlockingFailures([], 'INFO')).toBe(false);
  });
});
