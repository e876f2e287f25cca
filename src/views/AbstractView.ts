/**
 * @module
 *
 * This module provides a basic abstract class `AbstractView` that is useful in implementing the View interface.
 *
 * It derives every read-only query from `iterate` and every removal from `removeFirst`/`removeIf`, so a concrete view only needs to describe how it iterates its source and how it forwards insertions and removals.
 */

import { v4 as uuid } from 'uuid';
import { alwaysTrue, equalTo } from '../functions/Predicates';
import type { Predicate, Transform } from '../functions/types';
import { count, every, find, some } from '../utils/IterableHelper';
import type { FilteredView, FilteredViewOptions } from './FilteredView';
import type { MappedView, MappedViewOptions } from './MappedView';
import type { View } from './View';

/**
 * The basic prototype for creating a View.
 *
 * To extend `AbstractView`, derived classes should implement `version`, `iterate`, `add`, `removeFirst`, `removeIf`, `filter` and `map`. They may override `size` when it can be answered without a full pass.
 */
export abstract class AbstractView<TElement> implements View<TElement> {
  declare readonly identifier: string;

  abstract get version(): number;

  constructor() {
    // read-only and left out of enumeration and equality comparisons
    Object.defineProperty(this, 'identifier', {
      configurable: false,
      enumerable: false,
      value: uuid(),
      writable: false,
    });
  }

  /**
   * Counts the elements by iterating the view. Derived classes override this when the count is known without a full pass.
   */
  get size(): number {
    return count(this.iterate());
  }

  abstract iterate(): IterableIterator<TElement>;

  abstract add(element: TElement): boolean;

  abstract removeFirst(predicate: Predicate<TElement>): boolean;

  abstract removeIf(predicate: Predicate<TElement>): number;

  abstract filter<TNarrowed extends TElement>(
    predicate: (element: TElement) => element is TNarrowed,
    options?: FilteredViewOptions
  ): FilteredView<TElement, TNarrowed>;
  abstract filter(
    predicate: Predicate<TElement>,
    options?: FilteredViewOptions
  ): FilteredView<TElement>;

  abstract map<TResult>(
    transform: Transform<TElement, TResult>,
    options?: MappedViewOptions<TElement, TResult>
  ): MappedView<TElement, TResult>;

  /**
   * Implements the iterable protocol.
   */
  [Symbol.iterator](): IterableIterator<TElement> {
    return this.iterate();
  }

  isEmpty(): boolean {
    // only the first element is needed
    return this.iterate().next().done === true;
  }

  contains(element: TElement): boolean {
    return this.some(equalTo(element));
  }

  every(predicate: Predicate<TElement>): boolean {
    return every(this.iterate(), predicate);
  }

  some(predicate: Predicate<TElement>): boolean {
    return some(this.iterate(), predicate);
  }

  find(predicate: Predicate<TElement>): TElement | undefined {
    return find(this.iterate(), predicate);
  }

  remove(element: TElement): boolean {
    return this.removeFirst(equalTo(element));
  }

  clear(): void {
    this.removeIf(alwaysTrue());
  }

  toList(): Array<TElement> {
    return [...this.iterate()];
  }
}
