import { SequenceArgumentError } from '../errors/sequence.js';
import { collect, take, takeWhile } from '../utils/iterables.js';

/**
 * Incremental Sieve of Eratosthenes
 *
 * Produces 2, 3, 5, 7, 11, ... forever. Instead of a fixed-size table, each
 * known prime is filed as a "witness" against the next composite it has to
 * strike out. A candidate with no witnesses is prime; a candidate with
 * witnesses hands each of them on to its next multiple and is forgotten.
 *
 * The witness map only holds entries for primes up to sqrt(candidate) plus
 * the pending square of the latest prime, so its size never exceeds the
 * number of primes emitted so far.
 *
 * An instance is its own iterator and cannot be restarted; call `primes()`
 * for a fresh sequence. Instances share no state.
 */
export class PrimeSieve implements IterableIterator<number> {
  /** composite -> primes that witness it */
  private readonly witnesses = new Map<number, number[]>();
  private candidate = 2;

  next(): IteratorResult<number, never> {
    for (;;) {
      const q = this.candidate;
      this.candidate = q + 1;

      const factors = this.witnesses.get(q);
      if (!factors) {
        // Smaller multiples of q already carry a smaller witness
        this.witnesses.set(q * q, [q]);
        return { done: false, value: q };
      }

      for (const prime of factors) {
        this.fileWitness(prime + q, prime);
      }
      this.witnesses.delete(q);
    }
  }

  [Symbol.iterator](): this {
    return this;
  }

  /**
   * Number of composites currently marked by a witness
   */
  get pendingComposites(): number {
    return this.witnesses.size;
  }

  private fileWitness(composite: number, prime: number): void {
    const existing = this.witnesses.get(composite);
    if (existing) {
      existing.push(prime);
    } else {
      this.witnesses.set(composite, [prime]);
    }
  }
}

/**
 * Fresh, unbounded sequence of primes
 */
export function primes(): PrimeSieve {
  return new PrimeSieve();
}

/**
 * All primes strictly below `limit`
 */
export function primesBelow(limit: number): number[] {
  if (!Number.isSafeInteger(limit) || limit < 0) {
    throw new SequenceArgumentError(
      `limit must be a non-negative integer, received ${limit}`,
      'limit',
      limit,
      'primesBelow'
    );
  }
  return collect(takeWhile(primes(), (prime) => prime < limit));
}

/**
 * The n-th prime, counting 2 as the first
 */
export function nthPrime(n: number): number {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new SequenceArgumentError(
      `n must be a positive integer, received ${n}`,
      'n',
      n,
      'nthPrime'
    );
  }
  let found = 2;
  for (const prime of take(primes(), n)) {
    found = prime;
  }
  return found;
}
