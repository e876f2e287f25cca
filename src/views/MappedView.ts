/**
 * @module
 *
 * This module provides a `MappedView` which is able to intake an arbitrary unary function to "transform" the elements of its source.
 */

import type { Predicate, Transform } from '../functions/types';
import { UnsupportedOperation } from '../utils/errors';
import { map } from '../utils/IterableHelper';
import { AbstractView } from './AbstractView';
import { FilteredView, FilteredViewOptions } from './FilteredView';
import type { View } from './View';

export interface MappedViewOptions<TSource, TElement> {
  /**
   * Maps an exposed value back to a source element. Without it, `add` is unsupported since transforms are not generally invertible.
   */
  inverse?: Transform<TElement, TSource>;
  /**
   * Whether removals are supported. A removal locates source elements by transforming them and comparing the result, then removes them from the backing sequence.
   *
   * @default true
   */
  removable?: boolean;
}

/**
 * `MappedView` exposes `transform(element)` for every element of its source, in source order. Transformed values are computed on every pass and never stored.
 *
 * @type TSource: Type for the elements of the source view.
 * @type TElement: Type for the transformed elements.
 */
export class MappedView<TSource, TElement> extends AbstractView<TElement> {
  readonly source: View<TSource>;

  readonly transform: Transform<TSource, TElement>;

  readonly inverse?: Transform<TElement, TSource>;

  readonly removable: boolean;

  get version(): number {
    return this.source.version;
  }

  /**
   * @override
   * @description A transform never drops elements, so the size is the source's.
   */
  get size(): number {
    return this.source.size;
  }

  /**
   * @param source - The view being transformed. It is referenced, never copied.
   * @param transform - Produces the exposed value of each source element.
   * @param options - Which reverse mutations are supported.
   * @constructs MappedView
   */
  constructor(
    source: View<TSource>,
    transform: Transform<TSource, TElement>,
    { inverse, removable = true }: MappedViewOptions<TSource, TElement> = {}
  ) {
    super();
    this.source = source;
    this.transform = transform;
    this.inverse = inverse;
    this.removable = removable;
  }

  iterate(): IterableIterator<TElement> {
    return map(this.source, this.transform);
  }

  isEmpty(): boolean {
    return this.source.isEmpty();
  }

  /**
   * Adds `inverse(value)` to the source.
   *
   * @throws {UnsupportedOperation} when the view has no inverse transform.
   */
  add(value: TElement): boolean {
    if (this.inverse === undefined) {
      throw new UnsupportedOperation(
        `mapped view ${this.identifier} has no inverse transform to add with`
      );
    }

    return this.source.add(this.inverse(value));
  }

  /**
   * Removes the first source element whose transformed value satisfies the predicate.
   *
   * @throws {UnsupportedOperation} when the view is not removable.
   */
  removeFirst(predicate: Predicate<TElement>): boolean {
    this.assertRemovable();
    const transform = this.transform;
    return this.source.removeFirst((element) => predicate(transform(element)));
  }

  /**
   * Removes every source element whose transformed value satisfies the predicate.
   *
   * @throws {UnsupportedOperation} when the view is not removable.
   */
  removeIf(predicate: Predicate<TElement>): number {
    this.assertRemovable();
    const transform = this.transform;
    return this.source.removeIf((element) => predicate(transform(element)));
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

  protected assertRemovable(): void {
    if (!this.removable) {
      throw new UnsupportedOperation(`mapped view ${this.identifier} does not support removal`);
    }
  }
}
