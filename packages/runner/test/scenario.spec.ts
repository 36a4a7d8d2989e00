import { get, put } from '@cache-chain/core';
import { describe, expect, it } from 'vitest';
import { scenario } from '../src/index.js';

describe('scenario', () => {
  it('should append elements without changing the original', () => {
    const base = scenario('basic').exec(put<number, number>('C', 1, 1));

    const extended = base.exec([get<number, number>('C', 1)], put<number, number>('C', 2, 2));

    expect(base.elements).toHaveLength(1);
    expect(extended.name).toBe('basic');
    expect(extended.elements.map((element) => (element.kind === 'action' ? element.request : element.kind))).toEqual([
      'put C',
      'get C',
      'put C',
    ]);
  });

  it('should refuse an empty name', () => {
    expect(() => scenario('  ')).toThrow('Scenario name cannot be empty');
  });
});
