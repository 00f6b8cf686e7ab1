/**
 * Raised when an upstream body parses as JSON but does not have the shape
 * the pipeline reads.
 */
export class MalformedResponseError extends Error {
  constructor(
    readonly source: string,
    detail: string
  ) {
    super(`Malformed ${source} response: ${detail}`);
    this.name = 'MalformedResponseError';
  }
}
