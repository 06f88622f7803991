export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable relay configuration. Aborts the whole invocation. */
export class ConfigError extends RelayError {}

/** The source chat is unreachable or the bot lost access to it. */
export class SourceFatalError extends RelayError {}

export class DeliveryTransientError extends RelayError {
  readonly retryAfterMs?: number;

  constructor(message: string, options?: { cause?: unknown; retryAfterMs?: number }) {
    super(message, options);
    this.retryAfterMs = options?.retryAfterMs;
  }
}

/** Forwarding refused because the source content is protected. */
export class DeliveryRestrictedError extends RelayError {}

export class DeliveryFatalError extends RelayError {}

export class CursorConflictError extends RelayError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
