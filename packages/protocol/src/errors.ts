/**
 * Codec error classes. Neither is fatal to a connection: the offending
 * frame is dropped (decode) or rejected at the call site (encode).
 */

export type DecodeErrorReason = 'malformed';

export class DecodeError extends Error {
  readonly reason: DecodeErrorReason = 'malformed';

  constructor(
    message: string,
    /** Character offset into the decoded text, when known. */
    public readonly offset?: number
  ) {
    super(offset === undefined ? message : `${message} (at offset ${offset})`);
    this.name = 'DecodeError';
  }
}

export type EncodingErrorReason = 'unsupportedValue';

export class EncodingError extends Error {
  readonly reason: EncodingErrorReason = 'unsupportedValue';

  constructor(
    message: string,
    /** Location of the offending value, e.g. `$.payload.items[2]`. */
    public readonly path: string
  ) {
    super(`${message} at ${path}`);
    this.name = 'EncodingError';
  }
}
