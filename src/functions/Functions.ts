/**
 * @module
 *
 * This module provides transform factories and combinators.
 */

import type { Predicate, Transform } from './types';

export function identity<T>(): Transform<T, T> {
  return (input) => input;
}

/**
 * @returns A transform that ignores its input and always returns `value`.
 */
export function constant<T, R>(value: R): Transform<T, R> {
  return () => value;
}

/**
 * Composes two transforms: `compose(f, g)(x) === f(g(x))`. `g` is applied first.
 *
 * @param f - The outer transform, applied to the result of `g`.
 * @param g - The inner transform, applied to the input.
 */
export function compose<A, B, C>(f: Transform<B, C>, g: Transform<A, B>): Transform<A, C> {
  return (input) => f(g(input));
}

/**
 * Adapts a predicate into a boolean-valued transform, so that a predicate can be used with `map`.
 */
export function forPredicate<T>(predicate: Predicate<T>): Transform<T, boolean> {
  return (input) => predicate(input);
}
