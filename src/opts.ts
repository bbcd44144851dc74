import process from "node:process";

import type { Opts, SslMode } from "./api/index.js";

export type CheckedOpts = {
  readonly _connection: "tcp" | "uds";
  readonly host: string;
  readonly port: number;
  readonly sslmode: SslMode;
  readonly user: string;
  readonly password?: string | undefined;
  readonly database: string;
  readonly applicationName?: string | undefined;
  readonly clientEncoding?: string | undefined;
};

export const DEFAULT_HOST = "localhost";
export const DEFAULT_PORT = 5432;

export function parseSslMode(v: string | undefined): SslMode | undefined {
  switch (v) {
    case "disable":
    case "prefer":
    case "require":
    case "verify-ca":
    case "verify-full":
      return v;

    default:
      return undefined;
  }
}

export function checkAndFillDefault(
  opts: Opts,
  env: NodeJS.ProcessEnv = process.env,
): CheckedOpts {
  const host = opts.host ?? env["PGHOST"] ?? DEFAULT_HOST;
  let port = opts.port;
  if (typeof port === "undefined" && typeof env["PGPORT"] !== "undefined") {
    const n = Number.parseInt(env["PGPORT"], 10);
    if (!Number.isNaN(n)) {
      port = n;
    }
  }
  const user = opts.user ?? env["PGUSER"] ?? env["USER"] ?? env["LOGNAME"];
  const password = opts.password ?? env["PGPASSWORD"];
  const applicationName = env["PGAPPNAME"] ?? opts.fallbackApplicationName;
  // "auto" leaves the server default in place
  const clientEncoding = env["PGCLIENTENCODING"] === "auto"
    ? void 0
    : env["PGCLIENTENCODING"];
  let sslmode = opts.sslmode ?? parseSslMode(env["PGSSLMODE"]);

  if (typeof user === "undefined") {
    throw new Error("no user specified");
  }

  const database = opts.database ?? env["PGDATABASE"] ?? user;

  const _connection = host.startsWith("/") ? "uds" : "tcp";

  if (typeof sslmode === "undefined") {
    if (_connection === "uds") {
      sslmode = "disable";
    } else {
      sslmode = "prefer";
    }
  }

  return {
    _connection,
    host,
    port: port ?? DEFAULT_PORT,
    sslmode,
    user,
    password,
    database,
    applicationName,
    clientEncoding,
  };
}
