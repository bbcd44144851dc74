import type { Opts } from "./api/index.js";
import { parseSslMode } from "./opts.js";

export function isConnectionUri(text: string): boolean {
  return text.startsWith("postgres://") || text.startsWith("postgresql://");
}

/**
 * Parse a `postgres://` URI into connection options. Only the parts present
 * in the URI are set, so the result can be layered over other options.
 */
export function parse(text: string): Opts {
  const url = new URL(text);
  if (url.protocol !== "postgres:" && url.protocol !== "postgresql:") {
    throw new Error(`Invalid url: ${url.href}`);
  }

  let host: string | undefined;
  if (url.hostname !== "") {
    host = url.searchParams.get("host") ?? decodeURIComponent(url.hostname);
  } else {
    const h = url.searchParams.get("host");
    if (h !== null && !h.startsWith("/")) {
      throw new Error(`Invalid url: ${url.href}`);
    }
    host = h ?? void 0;
  }

  let port: number | undefined;
  const p = url.searchParams.get("port") ?? url.port;
  if (p !== "") {
    port = Number.parseInt(p, 10);
    if (Number.isNaN(port) || port < 1 || port > 65535) {
      throw new Error(`Invalid url: ${url.href}`);
    }
  }

  const nonEmpty = (v: string | null): string | undefined =>
    v === null || v === "" ? void 0 : v;

  const database = nonEmpty(
    url.searchParams.get("dbname") ?? decodeURIComponent(url.pathname.slice(1)),
  );
  const user = nonEmpty(
    url.searchParams.get("user") ?? decodeURIComponent(url.username),
  );
  const password = nonEmpty(
    url.searchParams.get("password") ?? decodeURIComponent(url.password),
  );

  let sslmode: Opts["sslmode"];
  const mode = url.searchParams.get("sslmode");
  if (mode !== null) {
    sslmode = parseSslMode(mode);
    if (typeof sslmode === "undefined") {
      throw new Error(`Invalid url: ${url.href}`);
    }
  }

  const result: Opts = {
    host,
    port,
    user,
    password,
    database,
    sslmode,
  };

  return result;
}
