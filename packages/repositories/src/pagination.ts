import { InvalidPaginationError } from '@tessera/protocol';

/**
 * Reject a non-positive limit or a negative offset.
 * @throws InvalidPaginationError
 */
export function assertValidPage(limit: number, offset: number): void {
  if (!Number.isInteger(limit) || !Number.isInteger(offset) || limit <= 0 || offset < 0) {
    throw new InvalidPaginationError(limit, offset);
  }
}
