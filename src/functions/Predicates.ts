/**
 * @module
 *
 * This module provides predicate factories and combinators. Every predicate produced here is pure and stateless, so it can be shared between views and evaluated any number of times.
 */

import type { Predicate, Transform } from './types';

/**
 * @returns A predicate that is true for every input.
 */
export function alwaysTrue<T>(): Predicate<T> {
  return () => true;
}

/**
 * @returns A predicate that is false for every input.
 */
export function alwaysFalse<T>(): Predicate<T> {
  return () => false;
}

/**
 * @returns A predicate that is true for `null` and `undefined`.
 */
export function isNull<T>(): Predicate<T> {
  return (input) => input === null || input === undefined;
}

/**
 * @returns A type guard that is true for every input except `null` and `undefined`. Filtering with it narrows the element type.
 *
 * @example
 * Sequence.of<string | null>('a', null).filter(notNull<string | null>()); // FilteredView<string | null, string>
 */
export function notNull<T>(): (input: T) => input is NonNullable<T> {
  return (input): input is NonNullable<T> => input !== null && input !== undefined;
}

/**
 * Tests whether the input is equal to `target` under SameValueZero, the equality `Array.prototype.includes` uses: like `===` except that `NaN` equals `NaN`.
 */
export function equalTo<T>(target: T): Predicate<T> {
  return (input) => input === target || (input !== input && target !== target);
}

/**
 * @param elements - A set that is consulted on every evaluation, so later changes to the set are observed.
 * @returns A predicate that is true when the input is a member of `elements`.
 */
export function isIn<T>(elements: ReadonlySet<T>): Predicate<T> {
  return (input) => elements.has(input);
}

/**
 * Tests whether a regular expression matches anywhere in the input, like `RegExp.prototype.test` with no anchoring.
 *
 * A `RegExp` carrying the `g` or `y` flag keeps a `lastIndex` between calls; those flags are dropped so the predicate has no state.
 *
 * @param pattern - A regular expression source string or a `RegExp`.
 */
export function containsPattern(pattern: string | RegExp): Predicate<string> {
  const regexp =
    typeof pattern === 'string'
      ? new RegExp(pattern)
      : new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return (input) => regexp.test(input);
}

/**
 * @returns A predicate that is true when every predicate is true. Predicates are evaluated left to right and evaluation stops at the first false one. With no predicates it is always true.
 */
export function and<T>(...predicates: Array<Predicate<T>>): Predicate<T> {
  return (input) => {
    for (const predicate of predicates) {
      if (!predicate(input)) {
        return false;
      }
    }
    return true;
  };
}

/**
 * @returns A predicate that is true when any predicate is true. Predicates are evaluated left to right and evaluation stops at the first true one. With no predicates it is always false.
 */
export function or<T>(...predicates: Array<Predicate<T>>): Predicate<T> {
  return (input) => {
    for (const predicate of predicates) {
      if (predicate(input)) {
        return true;
      }
    }
    return false;
  };
}

export function not<T>(predicate: Predicate<T>): Predicate<T> {
  return (input) => !predicate(input);
}

/**
 * Tests the result of a transform: `compose(p, f)(x) === p(f(x))`.
 */
export function compose<A, B>(predicate: Predicate<B>, transform: Transform<A, B>): Predicate<A> {
  return (input) => predicate(transform(input));
}
