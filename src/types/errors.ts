/**
 * Error classes for the scoreboard.
 *
 * Per-game parse failures stay inside the adapters, refresh failures are
 * recorded on the live state store, and only usage/startup errors end the
 * process.
 */

import type { ErrorKind, League } from "../../shared/schema";
import type { Logger } from "../logger";

export type ErrorContext = Record<string, unknown>;

// Base error class for the whole application
export class ScoreboardError extends Error {
  public readonly code: ErrorCode;
  public readonly context?: ErrorContext;

  constructor(message: string, code: ErrorCode, context?: ErrorContext) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * A single event in a provider payload could not become a Game.
 * Adapters log and skip these.
 */
export class GameParseError extends ScoreboardError {
  public readonly field: string;

  constructor(
    code: typeof ERROR_CODES.MISSING_FIELD | typeof ERROR_CODES.INVALID_FIELD,
    field: string,
    context?: ErrorContext
  ) {
    const verb = code === ERROR_CODES.MISSING_FIELD ? "missing" : "invalid";
    super(`${verb} field: ${field}`, code, { field, ...context });
    this.field = field;
  }

  static missing(field: string, context?: ErrorContext): GameParseError {
    return new GameParseError(ERROR_CODES.MISSING_FIELD, field, context);
  }

  static invalid(field: string, context?: ErrorContext): GameParseError {
    return new GameParseError(ERROR_CODES.INVALID_FIELD, field, context);
  }
}

/**
 * Failure of one whole refresh cycle. Recoverable: the previous snapshot stays
 * on screen and the kind drives the status line.
 */
export abstract class RefreshError extends ScoreboardError {
  abstract readonly kind: ErrorKind;
}

/**
 * Network failure, non-2xx response, timeout or abort
 */
export class TransportError extends RefreshError {
  readonly kind = "transport" as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, ERROR_CODES.TRANSPORT_ERROR, context);
  }
}

/**
 * Payload shape is beyond what the adapter tolerates (e.g. no events array)
 */
export class PayloadParseError extends RefreshError {
  readonly kind = "parse" as const;

  constructor(message: string, context?: ErrorContext) {
    super(message, ERROR_CODES.PARSE_ERROR, context);
  }
}

/**
 * The league has games today but none involve the filtered team
 */
export class NoSuchTeamError extends RefreshError {
  readonly kind = "no_such_team" as const;
  public readonly team: string;

  constructor(team: string, league: League) {
    super(`no results for filter "${team}"`, ERROR_CODES.NO_SUCH_TEAM, { team, league });
    this.team = team;
  }
}

/**
 * Invalid command-line input. Fatal before the terminal is initialized.
 */
export class UsageError extends ScoreboardError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ERROR_CODES.USAGE_ERROR, context);
  }
}

/**
 * Terminal could not be initialized. Fatal.
 */
export class StartupError extends ScoreboardError {
  constructor(message: string, context?: ErrorContext) {
    super(message, ERROR_CODES.STARTUP_ERROR, context);
  }
}

export const ERROR_CODES = {
  MISSING_FIELD: "MISSING_FIELD",
  INVALID_FIELD: "INVALID_FIELD",
  TRANSPORT_ERROR: "TRANSPORT_ERROR",
  PARSE_ERROR: "PARSE_ERROR",
  NO_SUCH_TEAM: "NO_SUCH_TEAM",
  USAGE_ERROR: "USAGE_ERROR",
  STARTUP_ERROR: "STARTUP_ERROR",
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];

export function isScoreboardError(error: unknown): error is ScoreboardError {
  return error instanceof ScoreboardError;
}

export function isRefreshError(error: unknown): error is RefreshError {
  return error instanceof RefreshError;
}

function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Extract safe error information for logging
 */
export function extractErrorInfo(error: unknown): {
  message: string;
  code?: string;
  context?: ErrorContext;
} {
  if (isScoreboardError(error)) {
    return {
      message: error.message,
      code: error.code,
      context: error.context,
    };
  }

  return {
    message: errorMessage(error),
  };
}

/**
 * Anything that escapes the transport without being classified is treated as
 * a transport failure.
 */
export function toRefreshError(error: unknown, context?: ErrorContext): RefreshError {
  if (isRefreshError(error)) return error;
  return new TransportError(errorMessage(error), context);
}

export function logError(log: Logger, error: unknown, context?: ErrorContext): void {
  log.error({ error: extractErrorInfo(error), context }, `Error occurred: ${errorMessage(error)}`);
}
