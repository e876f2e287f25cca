/**
 * @module
 *
 * This module provides the definition (interface) shared by a backing `Sequence` and every view derived from it.
 *
 * Views have the following properties:
 *
 *    + live: a view never copies elements. Every read is evaluated against the current state of its source, and every write passes through to the backing sequence.
 *    + lazy: filtering and transforming happen while iterating, never at view creation.
 *    + chainable: a view is itself a source for further views, so `sequence.filter(p).map(f).filter(q)` is a view over a view over a view over `sequence`.
 *    + non-owning: a view references its source, the source never references its views. A view has no lifecycle of its own; it is valid for as long as its backing sequence is.
 *
 * Views are not thread-safe and are not meant to be mutated while iterated. A backing sequence is fail-fast by default: an ongoing iteration over it, or over any view derived from it, throws `ConcurrentModification` on the step after a mutation.
 */

import type { Predicate, Transform } from '../functions/types';
import type { FilteredView, FilteredViewOptions } from './FilteredView';
import type { MappedView, MappedViewOptions } from './MappedView';

/**
 * View represents a live, ordered projection of a backing sequence.
 *
 * @type TElement: Type for the elements this view exposes.
 */
export interface View<TElement> extends Iterable<TElement> {
  /**
   * A uuid naming this view in error messages.
   */
  readonly identifier: string;

  /**
   * The mutation counter of the backing sequence. It changes whenever the backing sequence is mutated, through this view or otherwise.
   */
  readonly version: number;

  /**
   * The number of elements this view currently exposes.
   */
  readonly size: number;

  /**
   * @returns A lazy iterator over the current elements, in backing order. Each call starts a new pass that re-evaluates every predicate and transform.
   */
  iterate(): IterableIterator<TElement>;

  isEmpty(): boolean;

  /**
   * @returns Whether the view exposes an element equal to `element` under SameValueZero.
   */
  contains(element: TElement): boolean;

  every(predicate: Predicate<TElement>): boolean;

  some(predicate: Predicate<TElement>): boolean;

  find(predicate: Predicate<TElement>): TElement | undefined;

  /**
   * Appends an element to the backing sequence, through every view in between.
   *
   * @returns `true` as the backing sequence changed.
   * @throws {InvalidArgument} when a filtered view in the chain rejects the element.
   * @throws {UnsupportedOperation} when a mapped view in the chain cannot invert the element.
   */
  add(element: TElement): boolean;

  /**
   * Removes the first exposed element equal to `element` under SameValueZero from the backing sequence.
   *
   * @returns Whether an element was removed.
   */
  remove(element: TElement): boolean;

  /**
   * Removes the first exposed element satisfying the predicate from the backing sequence.
   *
   * @returns Whether an element was removed.
   */
  removeFirst(predicate: Predicate<TElement>): boolean;

  /**
   * Removes every exposed element satisfying the predicate from the backing sequence.
   *
   * @returns The number of removed elements.
   */
  removeIf(predicate: Predicate<TElement>): number;

  /**
   * Removes every exposed element from the backing sequence. Backing elements this view does not expose are kept.
   */
  clear(): void;

  /**
   * Creates a live view exposing the elements of this view that satisfy the predicate. A type guard narrows the element type of the new view.
   */
  filter<TNarrowed extends TElement>(
    predicate: (element: TElement) => element is TNarrowed,
    options?: FilteredViewOptions
  ): FilteredView<TElement, TNarrowed>;
  filter(predicate: Predicate<TElement>, options?: FilteredViewOptions): FilteredView<TElement>;

  /**
   * Creates a live view exposing `transform(element)` for every element of this view.
   */
  map<TResult>(
    transform: Transform<TElement, TResult>,
    options?: MappedViewOptions<TElement, TResult>
  ): MappedView<TElement, TResult>;

  /**
   * @returns A snapshot of the current elements: a new array that does not follow later changes.
   */
  toList(): Array<TElement>;
}
