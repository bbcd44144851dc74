import * as net from "node:net";
import * as tls from "node:tls";
import type * as stream from "node:stream";
import { Buffer } from "node:buffer";

import * as proto from "pg-protocol";

import type { SslMode } from "./api/index.js";
import { serializeBind, serializeStartup } from "./serialize.js";
import { zNoticeMessage } from "./types.js";
import type { NoticeMessage } from "./types.js";

function tlsOptions(host: string, sslmode: SslMode): tls.ConnectionOptions {
  switch (sslmode) {
    case "disable":
    case "prefer":
    case "require":
      return { rejectUnauthorized: false };

    case "verify-ca":
      return { rejectUnauthorized: true, checkServerIdentity: () => undefined };

    case "verify-full":
      return {
        rejectUnauthorized: true,
        servername: net.isIP(host) === 0 ? host : undefined,
      };

    default:
      throw new Error(`Unreachable ${sslmode satisfies never}`);
  }
}

async function wraptls(
  raw: stream.Duplex,
  opts: ConnectOpts,
): Promise<stream.Duplex> {
  raw.write(proto.serialize.requestSsl());
  const reply = await new Promise<number | undefined>((resolve, reject) => {
    raw.once("error", reject);
    raw.once("data", (buf: Buffer) => {
      raw.off("error", reject);
      resolve(buf[0]);
    });
  });

  switch (reply) {
    case 0x53: // S
      break;

    case 0x4e: // N
      if (opts.sslmode === "prefer") {
        return raw;
      }
      throw new Error("server does not support SSL, but SSL was required");

    default:
      throw new Error(`Server REPLY: requestSsl != S (${reply})`);
  }

  const secure = tls.connect({
    socket: raw,
    ...tlsOptions(opts.host, opts.sslmode),
  });
  await new Promise<void>((resolve, reject) => {
    secure.once("secureConnect", () => {
      secure.off("error", reject);
      resolve();
    });
    secure.once("error", reject);
  });
  return secure;
}

type BackendMessage = Parameters<Parameters<typeof proto.parse>[1]>[0];

/**
 * DataRow with its values as sent, in the session's client encoding.
 * `pg-protocol` decodes them as UTF-8.
 */
export type RawDataRow = {
  name: "dataRow";
  length: number;
  fieldCount: number;
  fields: (Buffer | null)[];
};

export type Message = BackendMessage | RawDataRow;

const DATA_ROW = 0x44; // D

function decodeDataRow(body: Buffer): (Buffer | null)[] {
  const fields: (Buffer | null)[] = [];
  const count = body.readInt16BE(0);
  let offset = 2;
  for (let i = 0; i < count; i++) {
    const len = body.readInt32BE(offset);
    offset += 4;
    if (len === -1) {
      fields.push(null);
    } else {
      fields.push(Buffer.from(body.subarray(offset, offset + len)));
      offset += len;
    }
  }
  return fields;
}

// Splits the byte stream into frames and keeps the fields of each DataRow.
class DataRowTap {
  #pending: Buffer = Buffer.alloc(0);
  readonly #rows: (Buffer | null)[][] = [];

  feed(chunk: Buffer): void {
    this.#pending = this.#pending.length === 0
      ? chunk
      : Buffer.concat([this.#pending, chunk]);
    while (this.#pending.length >= 5) {
      const end = 1 + this.#pending.readInt32BE(1);
      if (this.#pending.length < end) {
        break;
      }
      if (this.#pending[0] === DATA_ROW) {
        this.#rows.push(decodeDataRow(this.#pending.subarray(5, end)));
      }
      this.#pending = this.#pending.subarray(end);
    }
  }

  shift(): (Buffer | null)[] {
    const row = this.#rows.shift();
    if (typeof row === "undefined") {
      throw new Error("DataRow out of step with the stream");
    }
    return row;
  }
}

class ProtoStream extends ReadableStream<Message> {
  constructor(conn: stream.Readable) {
    let closed = false;
    const tap = new DataRowTap();
    super({
      start: (controller) => {
        conn.on("error", (e) => {
          if (!closed) {
            closed = true;
            controller.error(e);
          }
        });
        // registered before the parser, so a row is tapped before it is parsed
        conn.on("data", (chunk: Buffer) => tap.feed(chunk));
        void proto.parse(conn, (msg) => {
          if (msg.name === "dataRow") {
            const fields = tap.shift();
            controller.enqueue({
              name: "dataRow",
              length: msg.length,
              fieldCount: fields.length,
              fields,
            });
          } else {
            controller.enqueue(msg);
          }
        }).then(() => {
          if (!closed) {
            closed = true;
            controller.close();
          }
        });
      },
    });
  }
}

const serialize = {
  ...proto.serialize,
  bind: serializeBind,
  startup: serializeStartup,
};

type Names = keyof typeof serialize;
type SerializeOpts = {
  [P in Names]: Parameters<(typeof serialize)[P]>;
};
const serializers: {
  [P in Names]: (...opts: SerializeOpts[P]) => Buffer;
} = serialize;

export type Connection = {
  readUntilReady: () => AsyncIterable<Message>;
  write: <K extends Names>(name: K, ...opts: SerializeOpts[K]) => Promise<void>;
  close: () => Promise<void>;
};

export type ConnectOpts = {
  host: string;
  sslmode: SslMode;
  onNotice?: ((notice: NoticeMessage) => void) | undefined;
};

type State =
  | "READY"
  | "BUSY"
  | "WAIT_READY";

export async function connect(
  raw: stream.Duplex,
  opts: ConnectOpts,
): Promise<Connection> {
  const conn = opts.sslmode === "disable" ? raw : await wraptls(raw, opts);
  const stream = new ProtoStream(conn);
  const reader = stream.getReader();

  let state: State = "READY";
  let broken: boolean = false;
  const throwIfBroken = () => {
    if (broken) {
      throw new Error("Broken");
    }
  };

  const next = async (): Promise<Message> => {
    const { done, value } = await reader.read();
    if (done) {
      broken = true;
      throw new Error("server closed the connection unexpectedly");
    }
    return value;
  };

  return {
    readUntilReady: async function* () {
      throwIfBroken();

      let err: unknown;
      loop:
      while (state !== "READY") {
        let value: Message;
        try {
          value = await next();
        } catch (e) {
          broken = true;
          throw e;
        }

        const name = value.name;
        switch (name) {
          case "readyForQuery":
            switch (state) {
              case "WAIT_READY":
                break;
              default:
                throw new Error(`Unexpected state: ${state} ${name}`);
            }
            state = "READY";
            break loop;

          case "error":
            switch (state) {
              case "WAIT_READY":
              case "BUSY":
                break;
              default:
                throw new Error(`Unexpected state: ${state} ${name}`, {
                  cause: value,
                });
            }
            state = "WAIT_READY";
            err = value;
            break loop;

          case "notice":
            opts.onNotice?.(zNoticeMessage.parse(value));
            break;

          case "parseComplete":
          case "bindComplete":
          case "closeComplete":
          case "noData":
          case "portalSuspended":
          case "replicationStart":
          case "emptyQuery":
          case "copyDone":
          case "copyData":
          case "rowDescription":
          case "parameterDescription":
          case "parameterStatus":
          case "backendKeyData":
          case "notification":
          case "commandComplete":
          case "dataRow":
          case "copyInResponse":
          case "copyOutResponse":
          case "authenticationOk":
          case "authenticationMD5Password":
          case "authenticationCleartextPassword":
          case "authenticationSASL":
          case "authenticationSASLContinue":
          case "authenticationSASLFinal":
            yield value;
            break;

          default:
            throw new Error(`Unreachable ${name satisfies never}`);
        }
      }

      if (typeof err !== "undefined") {
        if (err instanceof proto.DatabaseError) {
          switch (err.severity) {
            case "FATAL":
            case "PANIC":
              broken = true;
              throw err;
            default:
              break;
          }
        } else {
          broken = true;
          throw err;
        }

        // Recovery
        let value: Message;
        do {
          value = await next();
        } while (value.name !== "readyForQuery");
        state = "READY";
        throw err;
      }
    },

    write: async (name, ...opts) => {
      throwIfBroken();

      const buf = serializers[name](...opts);

      switch (name) {
        case "startup":
          switch (state) {
            case "READY":
              break;
            default:
              throw new Error(`Unexpected state: ${state} ${name}`);
          }
          state = "WAIT_READY";
          break;

        // SIMPLE QUERY
        case "query":
        case "copyData":
        case "copyDone":
        case "copyFail":
          switch (state) {
            case "READY":
              break;
            default:
              throw new Error(`Unexpected state: ${state} ${name}`);
          }
          state = "WAIT_READY";
          break;

        // EXTENDED QUERY
        case "parse":
        case "describe":
        case "bind":
        case "execute":
          switch (state) {
            case "BUSY":
            case "READY":
              break;
            default:
              throw new Error(`Unexpected state: ${state} ${name}`);
          }
          state = "BUSY";
          break;

        case "sync":
          switch (state) {
            case "READY":
            case "BUSY":
              break;
            default:
              throw new Error(`Unexpected state: ${state} ${name}`);
          }
          state = "WAIT_READY";
          break;

        case "end":
        case "password":
        case "close":
        case "flush":
        case "cancel":
        case "requestSsl":
        case "sendSCRAMClientFinalMessage":
        case "sendSASLInitialResponseMessage":
          break;

        default:
          throw new Error(`Unreachable ${name satisfies never}`);
      }

      if (!conn.write(buf)) {
        await new Promise<void>((resolve) => conn.once("drain", resolve));
      }
    },

    close: async () => {
      if (!broken && conn.writable) {
        conn.write(proto.serialize.end());
      }
      broken = true;
      await new Promise<void>((resolve) => conn.end(() => resolve()));
      raw.destroy();
    },
  };
}
