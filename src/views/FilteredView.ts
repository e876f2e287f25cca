/**
 * @module
 *
 * This module provides a `FilteredView` which represents a live selection of the elements in its source that satisfy a predicate.
 */

import type { Predicate, Transform } from '../functions/types';
import { InvalidArgument } from '../utils/errors';
import { count, filter } from '../utils/IterableHelper';
import { AbstractView } from './AbstractView';
import { MappedView, MappedViewOptions } from './MappedView';
import type { View } from './View';

export interface FilteredViewOptions {
  /**
   * Whether `size` is remembered until the backing sequence is mutated. When disabled, every `size` query counts the matching elements again.
   *
   * @default true
   */
  cacheSize?: boolean;
}

/**
 * The last computed size together with the backing `version` it was computed at.
 */
interface SizeCache {
  version: number;
  size: number;
}

/**
 * `FilteredView` exposes the elements of its source that satisfy its predicate, in source order.
 *
 * The predicate is re-evaluated on every pass, so elements entering or leaving the source are reflected by the next read. With `cacheSize`, `size` is only recounted after the backing sequence is mutated, which assumes elements do not change in place while they are in it.
 *
 * Writes go through to the backing sequence:
 *
 *    + `add` accepts only elements satisfying the predicate and throws `InvalidArgument` otherwise.
 *    + removals only ever affect backing elements satisfying the predicate.
 *
 * @type TSource: Type for the elements of the source view.
 * @type TElement: Type for the exposed elements, narrower than `TSource` when the predicate is a type guard.
 */
export class FilteredView<
  TSource,
  TElement extends TSource = TSource
> extends AbstractView<TElement> {
  /**
   * Creates a `FilteredView` from a plain predicate, whose exposed element type is the source's.
   */
  static over<TSource>(
    source: View<TSource>,
    predicate: Predicate<TSource>,
    options?: FilteredViewOptions
  ): FilteredView<TSource> {
    return new FilteredView(
      source,
      (element: TSource): element is TSource => predicate(element),
      options
    );
  }

  readonly source: View<TSource>;

  readonly predicate: (element: TSource) => element is TElement;

  readonly cacheSize: boolean;

  protected _sizeCache?: SizeCache;

  get version(): number {
    return this.source.version;
  }

  /**
   * @override
   * @description Counts the elements satisfying the predicate. With `cacheSize`, the count is reused until the backing sequence is mutated.
   */
  get size(): number {
    if (!this.cacheSize) {
      return count(this.source, this.predicate);
    }

    const version = this.version;
    if (this._sizeCache === undefined || this._sizeCache.version !== version) {
      this._sizeCache = { version, size: count(this.source, this.predicate) };
    }
    return this._sizeCache.size;
  }

  /**
   * @param source - The view being filtered. It is referenced, never copied.
   * @param predicate - Selects the exposed elements.
   * @param options - Size caching behaviour.
   * @constructs FilteredView
   */
  constructor(
    source: View<TSource>,
    predicate: (element: TSource) => element is TElement,
    { cacheSize = true }: FilteredViewOptions = {}
  ) {
    super();
    this.source = source;
    this.predicate = predicate;
    this.cacheSize = cacheSize;
  }

  iterate(): IterableIterator<TElement> {
    return filter(this.source, this.predicate);
  }

  /**
   * Adds an element through to the backing sequence.
   *
   * @throws {InvalidArgument} when the element does not satisfy the predicate. The source is left unchanged.
   */
  add(element: TElement): boolean {
    if (!this.predicate(element)) {
      throw new InvalidArgument(
        `element ${String(element)} does not satisfy the predicate ` +
          `of filtered view ${this.identifier}`
      );
    }

    return this.source.add(element);
  }

  removeFirst(predicate: Predicate<TElement>): boolean {
    return this.source.removeFirst((element) => this.predicate(element) && predicate(element));
  }

  removeIf(predicate: Predicate<TElement>): number {
    return this.source.removeIf((element) => this.predicate(element) && predicate(element));
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
}
