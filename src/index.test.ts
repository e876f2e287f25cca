import fc from 'fast-check';
import { Functions, InvalidArgument, Iterables, Predicates, Sequence } from './index';

describe('filtering and transforming a list of names', () => {
  const createNames = () => Sequence.of('John', 'Jane', 'Adam', 'Tom');

  test('filtered view is backed by the original sequence', () => {
    const names = createNames();
    const result = names.filter(Predicates.containsPattern('a'));
    expect(result.size).toBe(2);
    expect(result.toList()).toEqual(['Jane', 'Adam']);

    result.add('Anna');
    expect(names.size).toBe(5);
  });

  test('adding an element rejected by the filter', () => {
    const names = createNames();
    const withA = names.filter(Predicates.containsPattern('a'));
    expect(() => withA.add('Elvis')).toThrow(InvalidArgument);
  });

  test('checking whether all elements match a condition', () => {
    const names = createNames();
    expect(names.every(Predicates.containsPattern('n|m'))).toBe(true);
    expect(names.every(Predicates.containsPattern('a'))).toBe(false);
  });

  test('removing through a transformed view', () => {
    const names = createNames();
    const lengths = names.map((name) => name.length);
    expect(lengths.toList()).toEqual([4, 4, 4, 3]);
    lengths.remove(3);
    expect(names.size).toBe(3);
  });

  test('filtering then transforming', () => {
    const names = createNames();
    const startsWithAOrT = Predicates.or(
      Predicates.containsPattern('^A'),
      Predicates.containsPattern('^T')
    );
    const lengths = names.filter(startsWithAOrT).map((name) => name.length);
    expect(lengths.toList()).toEqual([4, 3]);

    names.add('Ted');
    expect(lengths.toList()).toEqual([4, 3, 3]);
  });

  test('filter then map equals the comprehension over the snapshot', () => {
    const names = createNames();
    const p = Predicates.containsPattern('o');
    const f = Functions.compose((n: number) => n * 10, (s: string) => s.length);
    const expected = names
      .toList()
      .filter((name) => p(name))
      .map((name) => f(name));
    expect(names.filter(p).map(f).toList()).toEqual(expected);
    expect(expected).toEqual([40, 30]);
  });

  test('read-only iterable helpers', () => {
    const names = ['John', 'Jane', 'Adam', 'Tom'];
    expect([...Iterables.filter(names, Predicates.containsPattern('a'))]).toEqual(['Jane', 'Adam']);
    const containsM = Functions.forPredicate(Predicates.containsPattern('m'));
    expect([...Iterables.map(names, containsM)]).toEqual([false, false, true, true]);
  });

  describe('views agree with array comprehensions', () => {
    const hasEvenLength = (s: string) => s.length % 2 === 0;
    const length = (s: string) => s.length;

    test('filter', () => {
      fc.assert(
        fc.property(fc.array(fc.string()), (array) => {
          expect(Sequence.from(array).filter(hasEvenLength).toList()).toEqual(
            array.filter(hasEvenLength)
          );
        })
      );
    });

    test('map', () => {
      fc.assert(
        fc.property(fc.array(fc.string()), (array) => {
          expect(Sequence.from(array).map(length).toList()).toEqual(array.map(length));
        })
      );
    });

    test('filter then map', () => {
      fc.assert(
        fc.property(fc.array(fc.string()), (array) => {
          const view = Sequence.from(array).filter(hasEvenLength).map(length);
          expect(view.toList()).toEqual(array.filter(hasEvenLength).map(length));
          expect(view.size).toBe(array.filter(hasEvenLength).length);
        })
      );
    });
  });
});
