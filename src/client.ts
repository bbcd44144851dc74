import * as net from "node:net";
import type { Buffer } from "node:buffer";
import type * as stream from "node:stream";
import * as fs from "node:fs/promises";
import path from "node:path";

import {
  zCommandCompleteMessage,
  zDataRowMessage,
  zRowDescriptionMessage,
} from "./types.js";
import type { NoticeMessage } from "./types.js";
import type {
  Client,
  ExecuteResult,
  Param,
  ResultField,
} from "./api/index.js";
import type { Connection } from "./conn.js";
import { connect } from "./conn.js";
import { handleAuthentication } from "./auth.js";
import type { CheckedOpts } from "./opts.js";

export type { Client } from "./api/index.js";

/**
 * Opens the transport to the server. Replaced in tests by an in-memory
 * stream.
 */
export type Dialer = (opts: CheckedOpts) => Promise<stream.Duplex>;

export type OpenOpts = {
  dial?: Dialer | undefined;
  onNotice?: ((notice: NoticeMessage) => void) | undefined;
};

function connectTcp(opts: CheckedOpts): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const sock = net.connect({
      host: opts.host,
      port: opts.port,
    });
    sock.once("connect", () => {
      sock.off("error", reject);
      resolve(sock);
    });
    sock.once("error", reject);
  });
}

async function connectUds(opts: CheckedOpts): Promise<net.Socket> {
  const p = path.join(opts.host, `.s.PGSQL.${opts.port}`);
  // stat() first so a missing socket reports its path
  await fs.stat(p);
  return new Promise<net.Socket>((resolve, reject) => {
    const sock = net.connect({
      path: p,
    });
    sock.once("connect", () => {
      sock.off("error", reject);
      resolve(sock);
    });
    sock.once("error", reject);
  });
}

export async function connectSocket(opts: CheckedOpts): Promise<net.Socket> {
  if (opts._connection === "uds") {
    return await connectUds(opts);
  }
  return await connectTcp(opts);
}

function startupParameters(opts: CheckedOpts): Record<string, string> {
  const params: Record<string, string> = {
    user: opts.user,
    database: opts.database,
  };
  if (typeof opts.applicationName !== "undefined") {
    params["application_name"] = opts.applicationName;
  }
  if (typeof opts.clientEncoding !== "undefined") {
    params["client_encoding"] = opts.clientEncoding;
  }
  return params;
}

async function waitReady(conn: Connection): Promise<void> {
  for await (const msg of conn.readUntilReady()) {
    switch (msg.name) {
      case "parameterStatus":
      case "backendKeyData":
        break;

      default:
        throw new Error(`Not implemented ${msg.name}`);
    }
  }
}

function quoteLiteral(text: string): string {
  return `'${text.replaceAll("'", "''")}'`;
}

export function setClientEncodingCommand(encoding: string): string {
  return `SET client_encoding TO ${quoteLiteral(encoding)}`;
}

async function setClientEncoding(
  conn: Connection,
  encoding: string,
): Promise<ExecuteResult["status"]> {
  await conn.write("query", setClientEncodingCommand(encoding));

  let status: ExecuteResult["status"] = "PGRES_EMPTY_QUERY";
  for await (const msg of conn.readUntilReady()) {
    switch (msg.name) {
      case "commandComplete":
        status = "PGRES_COMMAND_OK";
        break;

      case "parameterStatus":
      case "emptyQuery":
        break;

      default:
        throw new Error(`Not implemented ${msg.name}`);
    }
  }
  return status;
}

async function execute(
  conn: Connection,
  text: string,
  param: Param,
): Promise<ExecuteResult> {
  await conn.write("parse", {
    text,
    types: param.type === 0 ? [] : [param.type],
  });
  await conn.write("bind", {
    values: [{ format: param.format, value: param.value }],
  });
  await conn.write("describe", {
    type: "P",
  });
  await conn.write("execute", {});
  await conn.write("sync");

  let status: ExecuteResult["status"] = "PGRES_COMMAND_OK";
  let command: string | undefined;
  let fields: ResultField[] = [];
  const rows: (Buffer | null)[][] = [];
  for await (const msg of conn.readUntilReady()) {
    switch (msg.name) {
      case "parseComplete":
      case "bindComplete":
      case "noData":
      case "parameterStatus":
        break;

      case "rowDescription": {
        const item = zRowDescriptionMessage.parse(msg);
        fields = item.fields.map((v) => ({
          name: v.name,
          dataTypeID: v.dataTypeID,
        }));
        status = "PGRES_TUPLES_OK";
        break;
      }

      case "dataRow": {
        const item = zDataRowMessage.parse(msg);
        rows.push(item.fields);
        break;
      }

      case "commandComplete": {
        const item = zCommandCompleteMessage.parse(msg);
        command = item.text;
        break;
      }

      case "emptyQuery":
        status = "PGRES_EMPTY_QUERY";
        break;

      default:
        throw new Error(`Not implemented ${msg.name}`);
    }
  }

  return { status, command, fields, rows };
}

/**
 * Connect, authenticate and wait until the server is ready for queries.
 */
export async function open(
  opts: CheckedOpts,
  { dial = connectSocket, onNotice }: OpenOpts = {},
): Promise<Client> {
  const sock = await dial(opts);

  let conn: Connection;
  try {
    conn = await connect(sock, {
      host: opts.host,
      sslmode: opts._connection === "uds" ? "disable" : opts.sslmode,
      onNotice,
    });
  } catch (e) {
    sock.destroy();
    throw e;
  }

  try {
    await conn.write("startup", startupParameters(opts));
    await handleAuthentication(conn, opts);
    await waitReady(conn);
  } catch (e) {
    await conn.close();
    throw e;
  }

  return {
    setClientEncoding: setClientEncoding.bind(null, conn),
    execute: execute.bind(null, conn),
    [Symbol.asyncDispose]: () => conn.close(),
  };
}
