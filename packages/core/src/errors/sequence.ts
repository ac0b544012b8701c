/**
 * Errors raised by the lazy sequence helpers
 */

import { TreelineError } from './base.js';

/**
 * Thrown when a count or limit passed to a sequence helper is out of range
 */
export class SequenceArgumentError extends TreelineError {
  constructor(
    message: string,
    public readonly argument: string,
    public readonly received: unknown,
    operation?: string
  ) {
    super(message, 'sequence.primes', operation, { argument, received });
  }
}
