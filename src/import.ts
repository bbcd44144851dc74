import { Buffer } from "node:buffer";
import { Console } from "node:console";
import process from "node:process";
import type { Readable, Writable } from "node:stream";

import * as proto from "pg-protocol";

import type { Client, Opts } from "./api/index.js";
import type { Config } from "./args.js";
import { setClientEncodingCommand } from "./client.js";
import type { Dialer } from "./client.js";
import { connect, Session } from "./connector.js";
import { documentParam } from "./document.js";
import {
  ConnectionError,
  formatError,
  InputError,
  StatementError,
} from "./errors.js";
import { readDocument } from "./input.js";
import type { PasswordPrompt } from "./prompt.js";
import type { NoticeMessage } from "./types.js";
import { isConnectionUri, parse as parseUrl } from "./url.js";

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 2;

export type ImportDeps = {
  prompt: PasswordPrompt;
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  env?: NodeJS.ProcessEnv | undefined;
  dial?: Dialer | undefined;
  session?: Session | undefined;
};

/**
 * Connection options from the command line. A `postgres://` database
 * argument is expanded and its values take precedence.
 */
export function connectionOpts(config: Config): Opts {
  const opts: Opts = {
    host: config.host,
    port: config.port,
    user: config.user,
    database: config.database,
    fallbackApplicationName: config.progname,
  };
  if (!isConnectionUri(config.database)) {
    return opts;
  }

  const uri = parseUrl(config.database);
  return {
    ...opts,
    host: uri.host ?? opts.host,
    port: uri.port ?? opts.port,
    user: uri.user ?? opts.user,
    password: uri.password,
    database: uri.database,
    sslmode: uri.sslmode,
  };
}

function statementError(e: unknown): never {
  if (e instanceof proto.DatabaseError) {
    throw new StatementError("PGRES_FATAL_ERROR", formatError(e), { cause: e });
  }
  throw e;
}

async function run(
  config: Config,
  deps: ImportDeps,
  log: Console,
): Promise<void> {
  const session = deps.session ?? new Session(deps.prompt);
  const onNotice = (notice: NoticeMessage) =>
    log.error(`${notice.severity ?? "NOTICE"}:  ${notice.message ?? ""}`);

  let client: Client;
  try {
    client = await connect(session, connectionOpts(config), {
      policy: config.prompt,
      env: deps.env ?? process.env,
      dial: deps.dial,
      onNotice,
    });
  } catch (e) {
    throw new ConnectionError(config.database, { cause: e });
  }
  await using _ = client;

  if (config.verbose) {
    log.log(`Connected to database "${config.database}"`);
    log.log(`Import ${config.type} document`);
  }

  if (typeof config.encoding !== "undefined") {
    if (config.verbose) {
      log.log(
        `execute command: ${setClientEncodingCommand(config.encoding)}`,
      );
    }
    const status = await client.setClientEncoding(config.encoding).catch(
      statementError,
    );
    if (config.verbose) {
      log.log(`Set encoding result status: ${status}`);
    }
    if (status !== "PGRES_COMMAND_OK") {
      throw new StatementError(status, "");
    }
  }

  const data = await readDocument(config.input, deps.stdin);
  if (config.verbose) {
    log.log(`Buffered data of size: ${data.length}`);
  }

  const result = await client.execute(
    config.command,
    documentParam(config.type, data),
  ).catch(statementError);
  if (config.verbose) {
    log.log(`Result status: ${result.status}`);
  }

  switch (result.status) {
    case "PGRES_COMMAND_OK":
      break;

    case "PGRES_TUPLES_OK": {
      if (result.rows.length > 1 || result.fields.length > 1) {
        log.error(
          `${config.progname}: warning: only first column of first row is displayed`,
        );
      }
      // written as received: the bytes are in the client encoding
      const value = result.rows[0]?.[0];
      if (value instanceof Buffer) {
        deps.stdout.write(Buffer.concat([value, Buffer.from("\n")]));
      }
      break;
    }

    case "PGRES_EMPTY_QUERY":
      throw new StatementError(result.status, "");

    default:
      throw new Error(`Unreachable ${result.status satisfies never}`);
  }
}

function report(config: Config, e: unknown, log: Console): void {
  const progname = config.progname;
  if (e instanceof ConnectionError) {
    log.error(`${e.message}:\n${formatError(e.cause)}`);
  } else if (e instanceof StatementError) {
    log.error(`${progname}: Unexpected result status: ${e.status}`);
    log.error(`${progname}: Error: ${e.message}`);
  } else if (e instanceof InputError) {
    log.error(`${progname}: ${e.message}`);
  } else {
    log.error(`${progname}: ${formatError(e)}`);
  }
}

/**
 * Connect, optionally set the client encoding, buffer the document and run
 * the statement with it as the only parameter. Returns the exit status; the
 * connection is closed on every path.
 */
export async function importDocument(
  config: Config,
  deps: ImportDeps,
): Promise<number> {
  const log = new Console({ stdout: deps.stdout, stderr: deps.stderr });
  try {
    await run(config, deps, log);
    return EXIT_SUCCESS;
  } catch (e) {
    report(config, e, log);
    return EXIT_FAILURE;
  }
}
