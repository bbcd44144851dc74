import type { Buffer } from "node:buffer";

/**
 * - disable ... Disable SSL Connection
 * - prefer ... Try SSL Connection first, fall back to plain when refused.
 * - require ... Enable SSL Connection. But not verify certificate.
 * - verify-ca ... Enable SSL Connection. But not verify host name.
 * - verify-full ... Enable SSL Connection.
 */
export type SslMode =
  | "disable"
  | "prefer"
  | "require"
  | "verify-ca"
  | "verify-full";

/**
 * Options for `open()`
 */
export type Opts = {
  /**
   * Target host (tcp).
   * Or startswith '/' is Unix Socket Domain.
   */
  host?: string | undefined;

  /**
   * Target port.
   */
  port?: number | undefined;

  /**
   * sslmode. See SslMode
   */
  sslmode?: SslMode | undefined;

  /**
   * Connecting user.
   */
  user?: string | undefined;

  /**
   * Password for Connecting user.
   */
  password?: string | undefined;

  /**
   * Target database.
   */
  database?: string | undefined;

  /**
   * Reported as `application_name` unless PGAPPNAME is set.
   */
  fallbackApplicationName?: string | undefined;
};

/**
 * How a bound parameter travels: its type OID (0 lets the server infer it),
 * wire format and raw bytes.
 */
export type Param = {
  type: number;
  format: "text" | "binary";
  value: Buffer;
};

/** Result column meta data. */
export type ResultField = {
  /** Column name. */
  name: string;
  /** Column type oid. */
  dataTypeID: number;
};

/**
 * `execute()` result.
 */
export type ExecuteResult = {
  status: "PGRES_COMMAND_OK" | "PGRES_TUPLES_OK" | "PGRES_EMPTY_QUERY";

  /**
   * Command tag, e.g. `INSERT 0 1`. Undefined for an empty query.
   */
  command?: string | undefined;

  /**
   * Result columns. Empty when the statement returns no result set.
   */
  fields: ResultField[];

  /**
   * Rows in text format as sent by the server, in the session's client
   * encoding. `null` for SQL NULL.
   */
  rows: (Buffer | null)[][];
};

/**
 * Database client.
 */
export type Client = {
  /**
   * Run `SET client_encoding TO ...` and return the result status.
   */
  setClientEncoding: (encoding: string) => Promise<ExecuteResult["status"]>;

  /**
   * Run one statement with a single bound parameter.
   */
  execute: (text: string, param: Param) => Promise<ExecuteResult>;

  [Symbol.asyncDispose]: () => Promise<void>;
};
