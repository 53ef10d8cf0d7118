export const NOT_FOUND_CODE = 'TESSEL_NOT_FOUND';

/** Line a runner writes to stderr before exiting with NOT_FOUND_EXIT_CODE. */
export const NOT_FOUND_SENTINEL = 'tessel-error: not found';

export const NOT_FOUND_EXIT_CODE = 44;

export class TesselError extends Error {
  /** The message without the [tessel] prefix, for response bodies. */
  readonly detail: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(`[tessel] ${message}`, options);
    this.name = new.target.name;
    this.detail = message;
  }
}

/**
 * Thrown by a logic unit when the requested resource does not exist.
 * The router answers with the 404 error page.
 */
export class NotFoundError extends TesselError {
  readonly code = NOT_FOUND_CODE;

  constructor(message = 'not found') {
    super(message);
  }
}

export function notFound(message?: string): never {
  throw new NotFoundError(message);
}

export function isNotFoundError(err: unknown): boolean {
  if (err instanceof NotFoundError) return true;
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === NOT_FOUND_CODE
  );
}

/** A precompiled artifact without a usable handleRequest export. */
export class InvalidPluginError extends TesselError {
  constructor(readonly artifactPath: string, reason: string) {
    super(`invalid plugin ${artifactPath}: ${reason}`);
  }
}

export class LogicExecutionError extends TesselError {
  constructor(message: string, readonly stderr = '', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class MalformedResultError extends TesselError {}

export class TemplateParseError extends TesselError {
  constructor(readonly file: string, detail: string) {
    super(`${file}: ${detail}`);
  }
}

export class TemplateExecutionError extends TesselError {}

export class ConfigError extends TesselError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Like errorMessage, minus the [tessel] prefix of our own errors. */
export function errorDetail(err: unknown): string {
  return err instanceof TesselError ? err.detail : errorMessage(err);
}
