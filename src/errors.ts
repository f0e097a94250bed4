/**
 * Error taxonomy shared by the gateway, the stores and the dispatch flows.
 */
export class CrewctlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A multiplexer call failed for a reason other than a duplicate or missing session. */
export class SessionError extends CrewctlError {
  constructor(
    readonly session: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Session ${session}: ${message}`, options);
  }
}

/** Raised by a gateway when the session already exists; `create` downgrades it to success. */
export class DuplicateSessionError extends SessionError {
  constructor(session: string) {
    super(session, 'duplicate session');
  }
}

/** Reading, parsing or writing a persisted file failed. */
export class PersistenceError extends CrewctlError {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${message} (${path})`, options);
  }
}

export class TaskNotFoundError extends CrewctlError {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found.`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
