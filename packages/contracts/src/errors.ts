/**
 * @module @crew-control/contracts/errors
 * Error taxonomy for a run.
 *
 * Only {@link ConfigurationError} is fatal. Everything else is caught at the
 * call site and degraded into metrics.
 */

export class CrewControlError extends Error {
  constructor(
    message: string,
    readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid configuration, surfaced at run start. */
export class ConfigurationError extends CrewControlError {
  constructor(
    message: string,
    readonly issues: readonly string[] = []
  ) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

/** Oracle returned something that does not match the expected structure. */
export class OracleResponseError extends CrewControlError {
  constructor(
    message: string,
    readonly raw?: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'ORACLE_RESPONSE_ERROR', options);
  }
}

/** A worker or team threw while producing output. */
export class TeamExecutionError extends CrewControlError {
  constructor(
    readonly team: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, 'TEAM_EXECUTION_ERROR', options);
  }
}

/** A router took more steps than allowed. */
export class RecursionLimitError extends CrewControlError {
  constructor(
    readonly router: string,
    readonly limit: number
  ) {
    super(`Router "${router}" exceeded recursion limit of ${limit} steps`, 'RECURSION_LIMIT');
  }
}

/**
 * Render any thrown value as a single line of text.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === 'string' ? error : 'Unknown error';
}
