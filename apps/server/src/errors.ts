export type ResponderErrorKind = 'InvalidNetwork' | 'RangeTooSmall' | 'MalformedRequest' | 'NoQuestion' | 'EncodeError';

/**
 * Error raised by the address pool and the query responder.
 *
 * `InvalidNetwork` and `RangeTooSmall` come from pool construction and abort startup.
 * The other kinds are per-datagram: the caller logs them and drops the datagram.
 */
export class ResponderError extends Error {
  readonly kind: ResponderErrorKind;

  constructor(kind: ResponderErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ResponderError';
    this.kind = kind;
  }
}

export function isResponderError(value: unknown, kind?: ResponderErrorKind): value is ResponderError {
  return value instanceof ResponderError && (kind === undefined || value.kind === kind);
}

/**
 * Invalid command-line flags or environment variables
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
