export type RelayErrorCode =
  | 'missing_type'
  | 'unknown_type'
  | 'missing_field'
  | 'invalid_field'
  | 'already_bound'
  | 'not_bound'
  | 'already_allocated'
  | 'not_claimed';

/**
 * A protocol violation by one client. It is reported back on the same
 * connection as an `error` response and never affects other sessions.
 */
export class RelayError extends Error {
  constructor(
    readonly code: RelayErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'RelayError';
  }
}

export function isRelayError(err: unknown): err is RelayError {
  return err instanceof RelayError;
}
