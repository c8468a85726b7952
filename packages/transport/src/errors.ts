/**
 * Transport error classes. Transport failures surface as state changes; these
 * classes give the `lastError` and `onError` reports a stable `name`.
 */

/** An operation was attempted in a state that does not allow it. */
export class StateError extends Error {
  constructor(
    message: string,
    public readonly state: string
  ) {
    super(message);
    this.name = 'StateError';
  }
}

/** The underlying socket closed, failed or stopped answering probes. */
export class TransportError extends Error {
  constructor(
    message: string,
    /** WebSocket close code, when the loss came from a close frame. */
    public readonly closeCode?: number
  ) {
    super(message);
    this.name = 'TransportError';
  }
}

export interface ConfigIssue {
  path: string;
  message: string;
}

/** Options or environment failed validation. */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly ConfigIssue[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}
