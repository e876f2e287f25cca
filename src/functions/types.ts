/**
 * A pure boolean-valued test.
 */
export type Predicate<T> = (input: T) => boolean;

/**
 * A pure value mapping from `T` to `R`.
 */
export type Transform<T, R> = (input: T) => R;
