/** Connect or read failure reported by a chat transport. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/** The poll loop spent its reconnect budget without getting a session back. */
export class ReconnectExhaustedError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not reconnect after ${attempts} attempts: ${reason}`, { cause });
    this.name = "ReconnectExhaustedError";
    this.attempts = attempts;
  }
}
