/**
 * Lazy helpers for consuming iterables, in particular unbounded ones
 */

/**
 * Take the first `count` items, pulling no more than that from the source
 */
export function* take<T>(source: Iterable<T>, count: number): Generator<T, void, undefined> {
  if (count <= 0) return;

  let taken = 0;
  for (const value of source) {
    yield value;
    taken++;
    if (taken >= count) return;
  }
}

/**
 * Yield items while `predicate` holds; the first failing item ends the sequence
 */
export function* takeWhile<T>(
  source: Iterable<T>,
  predicate: (value: T) => boolean
): Generator<T, void, undefined> {
  for (const value of source) {
    if (!predicate(value)) return;
    yield value;
  }
}

/**
 * Drain a finite iterable into an array
 */
export function collect<T>(source: Iterable<T>): T[] {
  const result: T[] = [];
  for (const value of source) {
    result.push(value);
  }
  return result;
}
