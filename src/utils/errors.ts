/**
 * Raised for caller mistakes (no source URL, projecting an unnormalized
 * record). Malformed document content never raises.
 */
export class ExtractionInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExtractionInputError';
  }
}
