/**
 * @module
 *
 * This module provides `Sequence`, the ordered and mutable backing storage that views are derived from.
 *
 * A `Sequence` owns its elements: it copies the iterable it is created from into an internal array. Every mutation increments its `version`, which views use to invalidate cached sizes and fail-fast iterators use to detect mutations during an iteration.
 */

import { EventNotifier } from '../composition/EventNotification';
import { equalTo } from '../functions/Predicates';
import type { Predicate, Transform } from '../functions/types';
import { AbstractView } from '../views/AbstractView';
import { FilteredView, FilteredViewOptions } from '../views/FilteredView';
import { MappedView, MappedViewOptions } from '../views/MappedView';
import { ConcurrentModification, IndexOutOfBounds } from '../utils/errors';

/**
 * A record describing one mutation of a sequence, delivered to subscribers of the `mutate` event after the mutation took effect.
 */
export type Mutation<TElement> =
  | { kind: 'insert'; index: number; element: TElement }
  | { kind: 'remove'; index: number; element: TElement }
  | { kind: 'replace'; index: number; element: TElement; previous: TElement }
  | { kind: 'clear'; removed: Array<TElement> };

export type SequenceEvents<TElement> = {
  mutate: [mutation: Mutation<TElement>];
};

export interface SequenceOptions {
  /**
   * Whether iterators throw `ConcurrentModification` when the sequence is mutated during iteration. When disabled, iterating while mutating has undefined results.
   *
   * @default true
   */
  failFast?: boolean;
}

/**
 * Sequence is the backing sequence of a chain of views, and a view of itself.
 *
 * @example
 * const names = Sequence.of('John', 'Jane', 'Adam', 'Tom');
 * const withA = names.filter(containsPattern('a')); // live: ['Jane', 'Adam']
 * withA.add('Anna'); // names is now ['John', 'Jane', 'Adam', 'Tom', 'Anna']
 */
export class Sequence<TElement> extends AbstractView<TElement> {
  /**
   * Sends a `mutate` event after every mutation.
   */
  readonly notifier: EventNotifier<SequenceEvents<TElement>> = new EventNotifier<
    SequenceEvents<TElement>
  >();

  readonly failFast: boolean;

  protected _elements: Array<TElement>;

  protected _version = 0;

  get version(): number {
    return this._version;
  }

  get size(): number {
    return this._elements.length;
  }

  /**
   * @param elements - Initial elements, copied into the new sequence.
   * @param options - Iteration behaviour.
   */
  constructor(elements: Iterable<TElement> = [], { failFast = true }: SequenceOptions = {}) {
    super();
    this._elements = [...elements];
    this.failFast = failFast;
  }

  static of<TElement>(...elements: Array<TElement>): Sequence<TElement> {
    return new Sequence(elements);
  }

  static from<TElement>(
    elements: Iterable<TElement>,
    options?: SequenceOptions
  ): Sequence<TElement> {
    return new Sequence(elements, options);
  }

  /**
   * @public
   * @generator
   * @yields The elements in order.
   * @throws {ConcurrentModification} on the step after a mutation, unless `failFast` is disabled.
   */
  *iterate(): IterableIterator<TElement> {
    const expectedVersion = this._version;
    for (let i = 0; i < this._elements.length; i++) {
      yield this._elements[i];
      if (this.failFast && this._version !== expectedVersion) {
        throw new ConcurrentModification(
          `sequence ${this.identifier} was modified during iteration`
        );
      }
    }
  }

  isEmpty(): boolean {
    return this._elements.length === 0;
  }

  /**
   * Gets an element at specified index.
   *
   * @param index - An integer at which the element will be retrieved.
   * @return The element at specified index. If no element is at specified index, return `undefined`.
   */
  get(index: number): TElement | undefined {
    return this.isIndexInBounds(index) ? this._elements[index] : undefined;
  }

  /**
   * @returns The index of the first element equal to `element` under SameValueZero, or -1.
   */
  indexOf(element: TElement): number {
    return this._elements.findIndex(equalTo(element));
  }

  /**
   * Replaces the element at specified index.
   *
   * @returns The element previously at that index.
   */
  set(index: number, element: TElement): TElement {
    this.assertIndexInBounds(index, this._elements.length);
    const previous = this._elements[index];
    this._elements[index] = element;
    this.mutated({ kind: 'replace', index, element, previous });
    return previous;
  }

  /**
   * Inserts an element before the element at specified index. An index equal to `size` appends.
   */
  insert(index: number, element: TElement): void {
    this.assertIndexInBounds(index, this._elements.length + 1);
    this._elements.splice(index, 0, element);
    this.mutated({ kind: 'insert', index, element });
  }

  /**
   * @returns The removed element.
   */
  removeAt(index: number): TElement {
    this.assertIndexInBounds(index, this._elements.length);
    const [element] = this._elements.splice(index, 1);
    this.mutated({ kind: 'remove', index, element });
    return element;
  }

  add(element: TElement): boolean {
    this.insert(this._elements.length, element);
    return true;
  }

  removeFirst(predicate: Predicate<TElement>): boolean {
    const index = this._elements.findIndex((element) => predicate(element));
    if (index === -1) {
      return false;
    }

    this.removeAt(index);
    return true;
  }

  /**
   * The predicate is evaluated on every element, in order, and all matches are removed before any `remove` event is emitted. Events are then emitted from the back, each carrying the index the element had when the elements after it were already gone, so subscribers that mutate the sequence in response cannot affect which elements are removed.
   */
  removeIf(predicate: Predicate<TElement>): number {
    const retained: Array<TElement> = [];
    const removed: Array<{ index: number; element: TElement }> = [];
    this._elements.forEach((element, index) => {
      if (predicate(element)) {
        removed.push({ index, element });
      } else {
        retained.push(element);
      }
    });

    if (removed.length === 0) {
      return 0;
    }

    this._elements = retained;
    for (let i = removed.length - 1; i >= 0; i--) {
      const { index, element } = removed[i];
      this.mutated({ kind: 'remove', index, element });
    }
    return removed.length;
  }

  clear(): void {
    if (this._elements.length === 0) {
      return;
    }

    const removed = this._elements;
    this._elements = [];
    this.mutated({ kind: 'clear', removed });
  }

  filter<TNarrowed extends TElement>(
    predicate: (element: TElement) => element is TNarrowed,
    options?: FilteredViewOptions
  ): FilteredView<TElement, TNarrowed>;
  filter(predicate: Predicate<TElement>, options?: FilteredViewOptions): FilteredView<TElement>;
  filter(predicate: Predicate<TElement>, options?: FilteredViewOptions): FilteredView<TElement> {
    return FilteredView.over(this, predicate, options);
  }

  map<TResult>(
    transform: Transform<TElement, TResult>,
    options?: MappedViewOptions<TElement, TResult>
  ): MappedView<TElement, TResult> {
    return new MappedView(this, transform, options);
  }

  toList(): Array<TElement> {
    return this._elements.slice();
  }

  protected isIndexInBounds(index: number): boolean {
    return Number.isInteger(index) && index >= 0 && index < this._elements.length;
  }

  protected assertIndexInBounds(index: number, upperBound: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= upperBound) {
      throw new IndexOutOfBounds(index, this._elements.length);
    }
  }

  protected mutated(mutation: Mutation<TElement>): void {
    this._version++;
    if (this.notifier.hasSubscribers('mutate')) {
      this.notifier.invoke('mutate', mutation);
    }
  }
}
