import { Sequence } from '../collections/Sequence';
import { compose, forPredicate } from '../functions/Functions';
import { containsPattern } from '../functions/Predicates';
import { ConcurrentModification, UnsupportedOperation } from '../utils/errors';
import { MappedView } from './MappedView';

const length = (s: string) => s.length;

describe('MappedView', () => {
  let names: Sequence<string>;

  beforeEach(() => (names = Sequence.of('John', 'Jane', 'Adam', 'Tom')));

  test('simple transformation', () => {
    const lengths = names.map(length);
    expect([...lengths]).toEqual([4, 4, 4, 3]);
    expect(lengths.size).toBe(4);
    expect(lengths.isEmpty()).toBe(false);
  });

  test('transform from a predicate', () => {
    const containsM = names.map(forPredicate(containsPattern('m')));
    expect(containsM.toList()).toEqual([false, false, true, true]);
  });

  test('transform from composed functions', () => {
    const isEven = (n: number) => n % 2 === 0;
    expect(names.map(compose(isEven, length)).toList()).toEqual([true, true, true, false]);
  });

  test('find and some over transformed values', () => {
    const lengths = names.map(length);
    expect(lengths.find((n) => n < 4)).toBe(3);
    expect(lengths.find((n) => n > 4)).toBeUndefined();
    expect(lengths.some((n) => n === 3)).toBe(true);
    expect(lengths.some((n) => n === 5)).toBe(false);
  });

  test('transform is evaluated on every pass', () => {
    const transform = jest.fn(length);
    const lengths = names.map(transform);
    expect(transform).not.toHaveBeenCalled();

    lengths.toList();
    lengths.toList();
    expect(transform).toHaveBeenCalledTimes(8);
  });

  test('reflects mutations of the backing sequence', () => {
    const lengths = names.map(length);
    names.add('Anna-Maria');
    names.removeAt(0);
    expect(lengths.toList()).toEqual([4, 4, 3, 10]);
    expect(lengths.size).toBe(4);
  });

  test('removing a transformed value removes its source element', () => {
    const lengths = names.map(length);
    expect(lengths.remove(3)).toBe(true);
    expect(names.size).toBe(3);
    expect(names.toList()).toEqual(['John', 'Jane', 'Adam']);
    expect(lengths.remove(3)).toBe(false);

    expect(lengths.removeFirst((n) => n > 3)).toBe(true);
    expect(names.toList()).toEqual(['Jane', 'Adam']);

    lengths.clear();
    expect(names.isEmpty()).toBe(true);
  });

  test('removeIf', () => {
    const initials = names.map((name) => name[0]);
    expect(initials.removeIf((initial) => initial === 'J')).toBe(2);
    expect(names.toList()).toEqual(['Adam', 'Tom']);
  });

  test('removal can be disabled', () => {
    const lengths = names.map(length, { removable: false });
    expect(() => lengths.remove(3)).toThrow(UnsupportedOperation);
    expect(() => lengths.removeIf(() => true)).toThrow(UnsupportedOperation);
    expect(() => lengths.clear()).toThrow(UnsupportedOperation);
    expect(names.size).toBe(4);
  });

  test('adding without an inverse is unsupported', () => {
    const lengths = names.map(length);
    expect(() => lengths.add(5)).toThrow(UnsupportedOperation);
    expect(names.size).toBe(4);
  });

  test('adding with an inverse', () => {
    const upper = names.map((name) => name.toUpperCase(), {
      inverse: (name) => name[0] + name.slice(1).toLowerCase(),
    });
    expect(upper.add('ANNA')).toBe(true);
    expect(names.toList()).toEqual(['John', 'Jane', 'Adam', 'Tom', 'Anna']);
    expect(upper.contains('ANNA')).toBe(true);
  });

  test('chaining a map over a map', () => {
    const doubled = names.map(length).map((n) => n * 2);
    expect(doubled).toBeInstanceOf(MappedView);
    expect(doubled.toList()).toEqual([8, 8, 8, 6]);
    expect(doubled.remove(6)).toBe(true);
    expect(names.toList()).toEqual(['John', 'Jane', 'Adam']);
  });

  test('fail-fast through the view', () => {
    const iterator = names.map(length).iterate();
    iterator.next();
    names.clear();
    expect(() => iterator.next()).toThrow(ConcurrentModification);
  });
});
