/**
 * Fatal conditions. These mean persisted state is corrupt or a caller broke
 * a precondition, so they are thrown and never caught inside the library.
 * Store I/O failures are not errors here: they come back as `false`.
 */

export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export class ConcurrentMutationError extends Error {
  constructor(operation: string, active: string) {
    super(`Cannot start ${operation} while ${active} is in progress`);
    this.name = 'ConcurrentMutationError';
  }
}

export function assertInvariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}
