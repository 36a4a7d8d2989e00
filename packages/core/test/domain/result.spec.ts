import { describe, expect, it } from 'vitest';
import { fail, flatMapSuccess, formatActionFailure, mapSuccess, type Result, success } from '../../src/index.js';

describe('Result helpers', () => {
  it('should map successful values', () => {
    expect(mapSuccess(success(2), (value) => value * 10)).toEqual({ success: true, value: 20 });
  });

  it('should pass failures through map', () => {
    const failed = fail('resolution', 'no active client');

    expect(mapSuccess(failed, (value: number) => value * 10)).toBe(failed);
  });

  it('should chain steps that can fail', () => {
    const halve = (value: number): Result<number> =>
      value % 2 === 0 ? success(value / 2) : fail('check', `${value} is odd`);

    expect(flatMapSuccess(success(4), halve)).toEqual({ success: true, value: 2 });
    expect(flatMapSuccess(success(3), halve)).toEqual({
      success: false,
      errors: [{ kind: 'check', message: '3 is odd' }],
    });
  });
});

describe('formatActionFailure', () => {
  it('should prefix action type and resource', () => {
    expect(
      formatActionFailure({
        request: 'get C',
        actionType: 'get',
        resource: 'C',
        reasons: [{ kind: 'resolution', message: 'no active client' }],
      }),
    ).toBe('get C: no active client');
  });

  it('should omit an empty resource and join reasons', () => {
    expect(
      formatActionFailure({
        request: 'commit',
        actionType: 'txCommit',
        resource: '',
        reasons: [
          { kind: 'operation', message: 'first' },
          { kind: 'operation', message: 'second' },
        ],
      }),
    ).toBe('txCommit: first; second');
  });
});
