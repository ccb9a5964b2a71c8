/**
 * Raised when code reaches a state that the type system says is impossible,
 * such as an out-of-range lifecycle state. Not meant to be caught.
 */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}

/**
 * Raised when the controller is used outside its lifecycle (e.g. started twice).
 */
export class ControllerStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ControllerStateError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A connection that was up dropped abnormally.
 */
export class ConnectionDroppedError extends Error {
  readonly code: number;
  readonly reason: string;

  constructor(code: number, reason: string) {
    super(reason ? `Connection dropped (${code}): ${reason}` : `Connection dropped (${code})`);
    this.name = 'ConnectionDroppedError';
    this.code = code;
    this.reason = reason;
  }
}

/**
 * Normalizes a rejection value into an Error. Error instances are returned as-is.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) {
    return value;
  }
  return new Error(String(value), { cause: value });
}
