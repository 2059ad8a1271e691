/**
 * Custom error classes for pipeline interruption handling.
 */

export class BatchCancelledError extends Error {
  constructor(message = 'Batch cancelled') {
    super(message);
    this.name = 'BatchCancelledError';
  }
}
