import * as proto from "pg-protocol";

export class PasswordRequiredError extends Error {
  constructor() {
    super("no password supplied");
    this.name = "PasswordRequiredError";
  }
}

export class ConnectionError extends Error {
  readonly database: string;

  constructor(database: string, options?: ErrorOptions) {
    super(`Connection to database "${database}" failed`, options);
    this.name = "ConnectionError";
    this.database = database;
  }
}

export class InputError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InputError";
  }
}

export type ResultStatus =
  | "PGRES_COMMAND_OK"
  | "PGRES_TUPLES_OK"
  | "PGRES_EMPTY_QUERY"
  | "PGRES_FATAL_ERROR";

export class StatementError extends Error {
  readonly status: ResultStatus;

  constructor(status: ResultStatus, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StatementError";
    this.status = status;
  }
}

/**
 * Render an error the way libpq does: `SEVERITY:  message`, followed by
 * DETAIL and HINT lines when the server sent them.
 */
export function formatError(err: unknown): string {
  if (err instanceof proto.DatabaseError) {
    const lines = [`${err.severity ?? "ERROR"}:  ${err.message}`];
    if (typeof err.detail !== "undefined") {
      lines.push(`DETAIL:  ${err.detail}`);
    }
    if (typeof err.hint !== "undefined") {
      lines.push(`HINT:  ${err.hint}`);
    }
    return lines.join("\n");
  }
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
