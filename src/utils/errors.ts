/**
 * Thrown when an argument is rejected by the receiving view, for example an element added to a `FilteredView` that does not satisfy its predicate.
 */
export class InvalidArgument extends Error {
  constructor(message = '') {
    super(message);
    this.name = 'InvalidArgumentError';
    this.message = message;
  }
}

/**
 * Thrown when a view cannot perform the requested mutation, for example adding to a `MappedView` that has no inverse transform.
 */
export class UnsupportedOperation extends Error {
  constructor(message = '') {
    super(message);
    this.name = 'UnsupportedOperationError';
    this.message = message;
  }
}

/**
 * Thrown by a fail-fast iterator when its backing sequence was mutated after the iteration started.
 */
export class ConcurrentModification extends Error {
  constructor(message = '') {
    super(message);
    this.name = 'ConcurrentModificationError';
    this.message = message;
  }
}

export class IndexOutOfBounds extends RangeError {
  constructor(index: number, size: number) {
    const message = `index ${index} is out of bounds for size ${size}`;
    super(message);
    this.name = 'IndexOutOfBoundsError';
    this.message = message;
  }
}
