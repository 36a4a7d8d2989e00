import { describe, expect, it } from 'vitest';
import { type Check, entries, fail, mapResult, runChecks, Session, success } from '../../src/index.js';

const result = new Map([[1, 100]]);

const failing = (description: string): Check<Map<number, number>> => ({
  description,
  evaluate: () => fail('check', `${description} failed`),
});

describe('runChecks', () => {
  it('should pass an empty check list through', () => {
    const session = Session.create();

    expect(runChecks([], result, session, 'aggregate')).toEqual({ success: true, value: session });
  });

  it('should apply updates of passing checks in order', () => {
    const checked = runChecks(
      [mapResult<number, number>().saveAs('first'), entries<number, number>().count.saveAs('count')],
      result,
      Session.create(),
      'aggregate',
    );

    if (!checked.success) {
      throw new Error('expected checks to pass');
    }
    expect(checked.value.get('first')).toEqual(new Map([[1, 100]]));
    expect(checked.value.get('count')).toBe(1);
  });

  it('should aggregate every failure', () => {
    const checked = runChecks([failing('a'), failing('b')], result, Session.create(), 'aggregate');

    expect(checked).toEqual({
      success: false,
      errors: [
        { kind: 'check', message: 'a failed' },
        { kind: 'check', message: 'b failed' },
      ],
    });
  });

  it('should stop at the first failure with failFast', () => {
    const checked = runChecks([failing('a'), failing('b')], result, Session.create(), 'failFast');

    expect(checked).toEqual({ success: false, errors: [{ kind: 'check', message: 'a failed' }] });
  });

  it('should apply no update when any check fails', () => {
    const saveThenFail = runChecks(
      [mapResult<number, number>().saveAs('saved'), failing('later')],
      result,
      Session.create(),
      'aggregate',
    );

    expect(saveThenFail.success).toBe(false);
  });

  it('should capture a throwing check', () => {
    const throwing: Check<Map<number, number>> = {
      description: 'explodes',
      evaluate: () => {
        throw new Error('boom');
      },
    };

    expect(runChecks([throwing], result, Session.create(), 'aggregate')).toEqual({
      success: false,
      errors: [{ kind: 'check', message: 'explodes: boom' }],
    });
  });

  it('should accept custom checks producing updates', () => {
    const custom: Check<Map<number, number>> = {
      description: 'size',
      evaluate: (map) => success((session: Session) => session.set('size', map.size)),
    };

    const checked = runChecks([custom], result, Session.create(), 'aggregate');

    expect(checked.success && checked.value.get('size')).toBe(1);
  });
});
