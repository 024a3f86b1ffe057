/**
 * Thrown when the order API answers successfully but the order cannot be
 * fully read from the body. Retrying does not fix a schema mismatch.
 */
export class MalformedOrderPayloadError extends Error {
  constructor(public readonly reason: string) {
    super(`Malformed order payload: ${reason}`);
    this.name = 'MalformedOrderPayloadError';
  }
}
