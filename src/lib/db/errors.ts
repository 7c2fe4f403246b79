export const STORE_UNAVAILABLE_MESSAGE = 'Database not available';

/**
 * Raised when an operation needs the database and there is none, either
 * because it never connected or because the driver lost the connection.
 */
export class StoreUnavailableError extends Error {
  public readonly reason: string;

  constructor(reason: string) {
    super(STORE_UNAVAILABLE_MESSAGE);
    this.name = 'StoreUnavailableError';
    this.reason = reason;
  }
}
