/**
 * @module
 * This module provide utility functions for Iterable.
 *
 * Every function here is read-only: it never mutates the iterable it is given. The generator functions (`filter`, `map`) are lazy -- nothing is evaluated until the result is iterated, and every element is evaluated again on each iteration if the input iterable can be iterated more than once.
 */

import type { Predicate, Transform } from '../functions/types';

/**
 * Lazily select the elements of an iterable satisfying a predicate. When the predicate is a type guard, the yielded elements are narrowed accordingly.
 *
 * @param iterable - The elements to filter.
 * @param predicate - A test evaluated once per element during iteration.
 * @yields Elements of iterable for which `predicate` returns true, in iteration order.
 */
export function filter<T, S extends T>(
  iterable: Iterable<T>,
  predicate: (element: T) => element is S
): IterableIterator<S>;
export function filter<T>(iterable: Iterable<T>, predicate: Predicate<T>): IterableIterator<T>;
export function* filter<T>(iterable: Iterable<T>, predicate: Predicate<T>): IterableIterator<T> {
  for (const element of iterable) {
    if (predicate(element)) {
      yield element;
    }
  }
}

/**
 * Lazily apply a transform to every element of an iterable.
 *
 * @param iterable - The elements to transform.
 * @param transform - A function evaluated once per element during iteration.
 * @yields `transform(element)` for every element of iterable, in iteration order.
 */
export function* map<T, R>(iterable: Iterable<T>, transform: Transform<T, R>): IterableIterator<R> {
  for (const element of iterable) {
    yield transform(element);
  }
}

/**
 * @returns True if every element satisfies the predicate (vacuously true for an empty iterable). Stops at the first element that does not.
 */
export function every<T>(iterable: Iterable<T>, predicate: Predicate<T>): boolean {
  for (const element of iterable) {
    if (!predicate(element)) {
      return false;
    }
  }
  return true;
}

/**
 * @returns True if at least one element satisfies the predicate. Stops at the first element that does.
 */
export function some<T>(iterable: Iterable<T>, predicate: Predicate<T>): boolean {
  for (const element of iterable) {
    if (predicate(element)) {
      return true;
    }
  }
  return false;
}

/**
 * @returns The first element satisfying the predicate, `undefined` if there is none.
 */
export function find<T>(iterable: Iterable<T>, predicate: Predicate<T>): T | undefined {
  for (const element of iterable) {
    if (predicate(element)) {
      return element;
    }
  }
  return undefined;
}

/**
 * Count the elements of an iterable, or only those satisfying a predicate when one is given.
 */
export function count<T>(iterable: Iterable<T>, predicate?: Predicate<T>): number {
  let n = 0;
  for (const element of iterable) {
    if (predicate === undefined || predicate(element)) {
      n++;
    }
  }
  return n;
}
