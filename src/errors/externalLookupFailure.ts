/**
 * Transport-level failure of the metadata lookup service
 *
 * Never escapes the metadata resolver; it becomes the error sentinel.
 */
export class ExternalLookupFailure extends Error {
  /** HTTP status when the service answered, null for timeouts and network errors */
  public readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "ExternalLookupFailure";
    this.status = status;
  }
}
