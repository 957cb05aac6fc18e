/**
 * Error taxonomy for the agent. Every error the HTTP layer can surface
 * carries a stable `code` and the status it maps to.
 */
export class AgentError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(statusCode: number, code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BadCommandError extends AgentError {
  constructor(message: string) {
    super(400, 'E_BAD_COMMAND', message);
  }
}

export class UnauthorizedError extends AgentError {
  constructor(message = 'Invalid or missing API key') {
    super(401, 'E_UNAUTHORIZED', message);
  }
}

export class NotFoundError extends AgentError {
  constructor(message = 'Not found') {
    super(404, 'E_NOT_FOUND', message);
  }
}

/** Non-fatal: the registration loop keeps retrying after this. */
export class RegistrationError extends AgentError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(502, 'E_REGISTRATION', message, details);
  }
}

/** The proxy's test facility rejected a candidate document. */
export class ValidationError extends AgentError {
  constructor(message: string, public readonly output?: string) {
    super(422, 'E_VALIDATION', message, output ? { output } : undefined);
  }
}

export type ReconcileFailure = 'invalid_config' | 'storage_unavailable' | 'timeout';

const RECONCILE_CODES: Record<ReconcileFailure, { status: number; code: string }> = {
  invalid_config: { status: 422, code: 'E_INVALID_CONFIG' },
  storage_unavailable: { status: 503, code: 'E_STORAGE_UNAVAILABLE' },
  timeout: { status: 504, code: 'E_TIMEOUT' },
};

export class ReconcileError extends AgentError {
  public readonly reason: ReconcileFailure;

  constructor(reason: ReconcileFailure, message: string, options?: { cause?: unknown }) {
    super(RECONCILE_CODES[reason].status, RECONCILE_CODES[reason].code, message);
    this.reason = reason;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** The live document cannot be parsed or has no managed inbound. Fatal at startup. */
export class StorageCorruptionError extends AgentError {
  constructor(message: string, public readonly path: string) {
    super(500, 'E_STORAGE_CORRUPT', message, { path });
  }
}

/** Raised by `withTimeout` when the wrapped operation does not settle in time. */
export class TimeoutError extends Error {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Settings file unreadable or the merged settings fail validation. Fatal at startup. */
export class ConfigError extends AgentError {
  constructor(message: string) {
    super(500, 'E_CONFIG', message);
  }
}

/** The proxy accepted the candidate but could not be signaled to load it. */
export class ReloadError extends AgentError {
  constructor(message: string) {
    super(502, 'E_RELOAD', message);
  }
}

export class ShuttingDownError extends AgentError {
  constructor() {
    super(503, 'E_SHUTTING_DOWN', 'Agent is shutting down');
  }
}

export class PayloadTooLargeError extends AgentError {
  constructor(limitBytes: number) {
    super(413, 'E_PAYLOAD_TOO_LARGE', `Request body exceeds ${limitBytes} bytes`);
  }
}
