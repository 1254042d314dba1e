/**
 * Raised when the store is asked to do something the job lifecycle forbids:
 * writing to a terminal record or storing an outcome that breaks a record
 * invariant. Always a bug in the caller.
 */
export class StoreCorruptionError extends Error {
  constructor(
    message: string,
    readonly jobKey: string,
    readonly jobId: string,
  ) {
    super(message)
    this.name = 'StoreCorruptionError'
  }
}
