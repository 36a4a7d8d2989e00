/**
 * Check builders
 *
 * Fluent construction of checks over map-style cache results. A builder first
 * describes what to extract (`entries().count`, `entries().find(0)`, `mapResult()`),
 * optionally transforms it, then validates it (`is`, `exists`, `gt`, ...). A builder
 * used directly as a check means `exists`; any check can also `saveAs` the extracted
 * value into the session.
 *
 * @example
 * ```typescript
 * get<number, number>('C', numberKey('key')).check(
 *   entries<number, number>().count.is(1),
 *   entries<number, number>().transform((e) => e.value).is(numberKey('value')),
 *   mapResult<number, number>().saveAs('saved'),
 * );
 * ```
 *
 * @module checks/builders
 */

import { isDeepStrictEqual } from 'node:util';
import { fail, type Result, success } from '../domain/result.js';
import { describeExpression, type Expression, formatValue, resolveExpression } from '../expressions/expression.js';
import type { Session } from '../session/session.js';
import type { Check, SessionUpdate } from './check.js';

/** Extracted value, or nothing */
export type Found<T> = { found: true; value: T } | { found: false };

const found = <T>(value: T): Found<T> => ({ found: true, value });
const NOTHING: Found<never> = { found: false };

/** Extracts the value a check looks at; failures are reported as check failures */
export type Extractor<R, T> = (result: R, session: Session) => Result<Found<T>>;

interface Validator<T> {
  readonly name: string;
  /** Returns what was wrong, or undefined when the value passes */
  test(extracted: Found<T>, session: Session): string | undefined;
}

/** One key-value pair of a cache result */
export interface Entry<K, V> {
  readonly key: K;
  readonly value: V;
}

export const entry = <K, V>(key: K, value: V): Entry<K, V> => ({ key, value });

const FOUND_NOTHING = 'found nothing';

const describeFound = (value: unknown): string => `found ${formatValue(value)}`;

/** Check combining an extraction with one validation */
export class ValidatedCheck<R, T> implements Check<R> {
  readonly description: string;

  constructor(
    private readonly extraction: string,
    private readonly extract: Extractor<R, T>,
    private readonly validator: Validator<T>,
    private readonly saveName?: string,
  ) {
    this.description = `${extraction}.${validator.name}`;
  }

  /** Saves the extracted value under `name` when the check passes and something was found */
  saveAs(name: string): ValidatedCheck<R, T> {
    return new ValidatedCheck(this.extraction, this.extract, this.validator, name);
  }

  evaluate(result: R, session: Session): Result<SessionUpdate | undefined> {
    const extracted = this.extract(result, session);
    if (!extracted.success) {
      return fail('check', `${this.description}: ${extracted.errors.map((error) => error.message).join('; ')}`);
    }

    const mismatch = this.validator.test(extracted.value, session);
    if (mismatch !== undefined) {
      return fail('check', `${this.description}: ${mismatch}`);
    }

    const { saveName } = this;
    if (saveName === undefined || !extracted.value.found) {
      return success(undefined);
    }
    const { value } = extracted.value;
    return success((current: Session) => current.set(saveName, value));
  }
}

type Comparison = 'gt' | 'gte' | 'lt' | 'lte';

const COMPARE: Record<Comparison, (actual: number, expected: number) => boolean> = {
  gt: (actual, expected) => actual > expected,
  gte: (actual, expected) => actual >= expected,
  lt: (actual, expected) => actual < expected,
  lte: (actual, expected) => actual <= expected,
};

/**
 * Extraction step of a check
 *
 * @typeParam R - Operation result type
 * @typeParam T - Extracted value type
 */
export class CheckBuilder<R, T> implements Check<R> {
  constructor(
    readonly description: string,
    protected readonly extract: Extractor<R, T>,
  ) {}

  /** A bare builder checks that something was extracted */
  evaluate(result: R, session: Session): Result<SessionUpdate | undefined> {
    return this.exists().evaluate(result, session);
  }

  transform<U>(fn: (value: T, session: Session) => U): CheckBuilder<R, U> {
    const extract = this.extract;
    return new CheckBuilder(`${this.description}.transform`, (result, session) => {
      const extracted = extract(result, session);
      if (!extracted.success) {
        return extracted;
      }
      return success(extracted.value.found ? found(fn(extracted.value.value, session)) : NOTHING);
    });
  }

  exists(): ValidatedCheck<R, T> {
    return this.validated({
      name: 'exists',
      test: (extracted) => (extracted.found ? undefined : FOUND_NOTHING),
    });
  }

  notExists(): ValidatedCheck<R, T> {
    return this.validated({
      name: 'notExists',
      test: (extracted) => (extracted.found ? describeFound(extracted.value) : undefined),
    });
  }

  is(expected: Expression<T>): ValidatedCheck<R, T> {
    return this.validated({
      name: `is(${describeExpression(expected)})`,
      test: (extracted, session) => {
        const resolved = resolveExpression(expected, session);
        if (!resolved.success) {
          return resolved.errors.map((error) => error.message).join('; ');
        }
        if (!extracted.found) {
          return FOUND_NOTHING;
        }
        return isDeepStrictEqual(extracted.value, resolved.value) ? undefined : describeFound(extracted.value);
      },
    });
  }

  not(unexpected: Expression<T>): ValidatedCheck<R, T> {
    return this.validated({
      name: `not(${describeExpression(unexpected)})`,
      test: (extracted, session) => {
        const resolved = resolveExpression(unexpected, session);
        if (!resolved.success) {
          return resolved.errors.map((error) => error.message).join('; ');
        }
        if (!extracted.found) {
          return undefined;
        }
        return isDeepStrictEqual(extracted.value, resolved.value) ? describeFound(extracted.value) : undefined;
      },
    });
  }

  /** Passes when the extracted value is `null` or `undefined` */
  isNull(): ValidatedCheck<R, T> {
    return this.validated({
      name: 'isNull',
      test: (extracted) => {
        if (!extracted.found) {
          return FOUND_NOTHING;
        }
        return extracted.value === null || extracted.value === undefined ? undefined : describeFound(extracted.value);
      },
    });
  }

  notNull(): ValidatedCheck<R, T> {
    return this.validated({
      name: 'notNull',
      test: (extracted) => {
        if (!extracted.found) {
          return FOUND_NOTHING;
        }
        return extracted.value === null || extracted.value === undefined ? describeFound(extracted.value) : undefined;
      },
    });
  }

  /**
   * Validates the extracted value against arbitrary session data
   *
   * @example
   * ```typescript
   * mapResult<number, number>().validate((map, session) => map.get(1) === session.get('value'));
   * ```
   */
  validate(predicate: (value: T, session: Session) => boolean, name = 'validate'): ValidatedCheck<R, T> {
    return this.validated({
      name,
      test: (extracted, session) => {
        if (!extracted.found) {
          return FOUND_NOTHING;
        }
        return predicate(extracted.value, session) ? undefined : describeFound(extracted.value);
      },
    });
  }

  gt(this: CheckBuilder<R, number>, expected: number): ValidatedCheck<R, number> {
    return this.compare('gt', expected);
  }

  gte(this: CheckBuilder<R, number>, expected: number): ValidatedCheck<R, number> {
    return this.compare('gte', expected);
  }

  lt(this: CheckBuilder<R, number>, expected: number): ValidatedCheck<R, number> {
    return this.compare('lt', expected);
  }

  lte(this: CheckBuilder<R, number>, expected: number): ValidatedCheck<R, number> {
    return this.compare('lte', expected);
  }

  /** Saves the extracted value; fails only when nothing could be extracted */
  saveAs(name: string): ValidatedCheck<R, T> {
    return this.exists().saveAs(name);
  }

  private compare(this: CheckBuilder<R, number>, comparison: Comparison, expected: number): ValidatedCheck<R, number> {
    return this.validated({
      name: `${comparison}(${expected})`,
      test: (extracted) => {
        if (!extracted.found) {
          return FOUND_NOTHING;
        }
        return COMPARE[comparison](extracted.value, expected) ? undefined : describeFound(extracted.value);
      },
    });
  }

  private validated(validator: Validator<T>): ValidatedCheck<R, T> {
    return new ValidatedCheck(this.description, this.extract, validator);
  }
}

const toEntries = <K, V>(map: ReadonlyMap<K, V>): Entry<K, V>[] =>
  [...map].map(([key, value]) => entry(key, value));

const onlyEntry = <K, V>(map: ReadonlyMap<K, V>): Result<Found<Entry<K, V>>> => {
  const all = toEntries(map);
  const [first] = all;
  if (first === undefined) {
    return success(NOTHING);
  }
  if (all.length > 1) {
    return fail('check', `ambiguous: ${all.length} entries, use find(index) or findByKey(key)`);
  }
  return success(found(first));
};

/**
 * Entry-oriented view of a cache result
 *
 * Without further selection it extracts the only entry: nothing for a miss, and an
 * "ambiguous" failure when the result holds several entries.
 */
export class EntriesCheckBuilder<K, V> extends CheckBuilder<Map<K, V>, Entry<K, V>> {
  constructor() {
    super('entries', (map) => onlyEntry(map));
  }

  /** Number of entries; always extracted, so a miss counts as 0 */
  get count(): CheckBuilder<Map<K, V>, number> {
    return new CheckBuilder('entries.count', (map) => success(found(map.size)));
  }

  /** The only entry, or the entry at `index` in result order */
  find(index?: number): CheckBuilder<Map<K, V>, Entry<K, V>> {
    if (index === undefined) {
      return new CheckBuilder('entries.find', (map) => onlyEntry(map));
    }
    return new CheckBuilder(`entries.find(${index})`, (map) => {
      const selected = toEntries(map)[index];
      return success(selected === undefined ? NOTHING : found(selected));
    });
  }

  findByKey(key: Expression<K>): CheckBuilder<Map<K, V>, Entry<K, V>> {
    return new CheckBuilder(`entries.findByKey(${describeExpression(key)})`, (map, session) => {
      const resolved = resolveExpression(key, session);
      if (!resolved.success) {
        return resolved;
      }
      const selected = toEntries(map).find((candidate) => isDeepStrictEqual(candidate.key, resolved.value));
      return success(selected === undefined ? NOTHING : found(selected));
    });
  }

  /** All entries; nothing for an empty result */
  findAll(): CheckBuilder<Map<K, V>, Entry<K, V>[]> {
    return new CheckBuilder('entries.findAll', (map) => {
      const all = toEntries(map);
      return success(all.length === 0 ? NOTHING : found(all));
    });
  }
}

export const entries = <K, V>(): EntriesCheckBuilder<K, V> => new EntriesCheckBuilder<K, V>();

/** The raw key-to-value result */
export const mapResult = <K, V>(): CheckBuilder<Map<K, V>, Map<K, V>> =>
  new CheckBuilder('mapResult', (map) => success(found(map)));
