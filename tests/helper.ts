import { Buffer } from "node:buffer";
import * as crypt from "node:crypto";
import { Duplex, Writable } from "node:stream";

import type { Dialer } from "../src/client.js";

export type AuthMethod =
  | "trust"
  | "password"
  | "md5"
  | "scram-sha-256";

export type Bound = {
  text: string;
  types: number[];
  formats: number[];
  values: (Buffer | null)[];
};

export type Outcome =
  | { kind: "command"; tag: string; notice?: string | undefined }
  | {
    kind: "rows";
    fields: string[];
    rows: (string | Buffer | null)[][];
    notice?: string | undefined;
  }
  | { kind: "empty" }
  | { kind: "error"; message: string; code?: string | undefined };

export type RunOpts = {
  authMethod?: AuthMethod | undefined;
  password?: string | undefined;
  query?: ((sql: string) => Outcome) | undefined;
  execute?: ((bound: Bound) => Outcome) | undefined;
  /** Split what the backend sends into chunks of at most this size. */
  chunkSize?: number | undefined;
};

export type PgServer = {
  readonly dial: Dialer;
  /** Startup parameters, one entry per connection. */
  readonly startups: Record<string, string>[];
  /** Password messages received. */
  readonly passwords: string[];
  /** Simple-protocol queries received. */
  readonly queries: string[];
  /** Parameters bound by extended-protocol statements. */
  readonly bound: Bound[];
  /** Frontend message types in arrival order, startup as `startup`. */
  readonly messages: string[];
  readonly terminated: () => number;
};

export const MD5_SALT = Buffer.from([0x01, 0x02, 0x03, 0x04]);

const SCRAM_SALT = Buffer.from("pgdocload-salt");
const SCRAM_ITERATIONS = 4096;
const SCRAM_SERVER_NONCE = "c2VydmVyLW5vbmNl";

const SSL_REQUEST_CODE = 80877103;

function int16(n: number): Buffer {
  const buf = Buffer.alloc(2);
  buf.writeInt16BE(n);
  return buf;
}

function int32(n: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeInt32BE(n);
  return buf;
}

function cstr(text: string): Buffer {
  return Buffer.from(`${text}\0`, "utf8");
}

function frame(type: string, ...parts: Buffer[]): Buffer {
  const body = Buffer.concat(parts);
  const head = Buffer.alloc(5);
  head.write(type, 0, "latin1");
  head.writeInt32BE(body.length + 4, 1);
  return Buffer.concat([head, body]);
}

function errorFields(severity: string, code: string, message: string) {
  return [
    Buffer.from("S"),
    cstr(severity),
    Buffer.from("V"),
    cstr(severity),
    Buffer.from("C"),
    cstr(code),
    Buffer.from("M"),
    cstr(message),
    Buffer.from([0]),
  ];
}

export const backend = {
  authenticationOk: () => frame("R", int32(0)),
  authenticationCleartextPassword: () => frame("R", int32(3)),
  authenticationMD5Password: (salt: Buffer) => frame("R", int32(5), salt),
  authenticationSASL: (mechanism: string) =>
    frame("R", int32(10), cstr(mechanism), Buffer.from([0])),
  authenticationSASLContinue: (data: string) =>
    frame("R", int32(11), Buffer.from(data)),
  authenticationSASLFinal: (data: string) =>
    frame("R", int32(12), Buffer.from(data)),
  parameterStatus: (name: string, value: string) =>
    frame("S", cstr(name), cstr(value)),
  backendKeyData: () => frame("K", int32(4242), int32(1)),
  readyForQuery: () => frame("Z", Buffer.from("I")),
  parseComplete: () => frame("1"),
  bindComplete: () => frame("2"),
  noData: () => frame("n"),
  emptyQuery: () => frame("I"),
  commandComplete: (tag: string) => frame("C", cstr(tag)),
  rowDescription: (names: string[]) =>
    frame(
      "T",
      int16(names.length),
      ...names.map((name) =>
        Buffer.concat([
          cstr(name),
          int32(0),
          int16(0),
          int32(25),
          int16(-1),
          int32(-1),
          int16(0),
        ])
      ),
    ),
  dataRow: (values: (string | Buffer | null)[]) =>
    frame(
      "D",
      int16(values.length),
      ...values.map((v) => {
        if (v === null) {
          return int32(-1);
        }
        const bytes = typeof v === "string" ? Buffer.from(v) : v;
        return Buffer.concat([int32(bytes.length), bytes]);
      }),
    ),
  error: (severity: string, code: string, message: string) =>
    frame("E", ...errorFields(severity, code, message)),
  notice: (message: string) =>
    frame("N", ...errorFields("NOTICE", "00000", message)),
};

class Reader {
  #offset = 0;
  constructor(private readonly buf: Buffer) {}

  cstring(): string {
    const end = this.buf.indexOf(0, this.#offset);
    const s = this.buf.toString("utf8", this.#offset, end);
    this.#offset = end + 1;
    return s;
  }

  int16(): number {
    const n = this.buf.readInt16BE(this.#offset);
    this.#offset += 2;
    return n;
  }

  int32(): number {
    const n = this.buf.readInt32BE(this.#offset);
    this.#offset += 4;
    return n;
  }

  rest(): string {
    const s = this.buf.toString("utf8", this.#offset);
    this.#offset = this.buf.length;
    return s;
  }

  bytes(n: number): Buffer {
    const b = Buffer.from(this.buf.subarray(this.#offset, this.#offset + n));
    this.#offset += n;
    return b;
  }
}

function md5Hex(...parts: (string | Buffer)[]): string {
  const h = crypt.createHash("md5");
  for (const p of parts) {
    h.update(p);
  }
  return h.digest("hex");
}

function hmac(key: Buffer, data: string): Buffer {
  return crypt.createHmac("sha256", key).update(data).digest();
}

function xor(b1: Buffer, b2: Buffer): Buffer {
  const r = Buffer.alloc(b1.length);
  for (let i = 0; i < b1.length; i++) {
    r.writeUInt8(b1.readUInt8(i) ^ b2.readUInt8(i), i);
  }
  return r;
}

function defaultQuery(sql: string): Outcome {
  return { kind: "command", tag: sql.split(" ")[0]?.toUpperCase() ?? "" };
}

function defaultExecute(): Outcome {
  return { kind: "command", tag: "INSERT 0 1" };
}

type ServerState = PgServer & { terminations: number };

/**
 * A backend speaking just enough of the v3 protocol for one client
 * connection, over an in-memory stream.
 */
class FakeConnection {
  readonly socket: Duplex;
  #buf = Buffer.alloc(0);
  #started = false;
  #ended = false;
  #skipping = false;
  #user = "";
  #parsed: Pick<Bound, "text" | "types"> = { text: "", types: [] };
  #outcome: Outcome = { kind: "empty" };
  #scram: { clientFirstBare: string; serverFirst: string } | undefined;

  constructor(
    private readonly opts: RunOpts,
    private readonly server: ServerState,
  ) {
    this.socket = new Duplex({
      read() {},
      write: (chunk: Buffer, _encoding, callback) => {
        this.#feed(chunk);
        callback();
      },
      final: (callback) => {
        this.#end();
        callback();
      },
    });
  }

  #send(...frames: Buffer[]): void {
    if (this.#ended) {
      return;
    }
    const data = Buffer.concat(frames);
    const size = this.opts.chunkSize ?? data.length;
    for (let i = 0; i < data.length; i += size) {
      this.socket.push(data.subarray(i, i + size));
    }
  }

  #end(): void {
    if (!this.#ended) {
      this.#ended = true;
      this.socket.push(null);
    }
  }

  #feed(chunk: Buffer): void {
    this.#buf = Buffer.concat([this.#buf, chunk]);
    while (true) {
      if (!this.#started) {
        if (this.#buf.length < 8) {
          return;
        }
        const len = this.#buf.readInt32BE(0);
        if (this.#buf.length < len) {
          return;
        }
        const code = this.#buf.readInt32BE(4);
        const body = this.#buf.subarray(8, len);
        this.#buf = this.#buf.subarray(len);
        if (code === SSL_REQUEST_CODE) {
          this.server.messages.push("sslRequest");
          this.#send(Buffer.from("N"));
        } else {
          this.#started = true;
          this.#startup(body);
        }
        continue;
      }

      if (this.#buf.length < 5) {
        return;
      }
      const type = String.fromCharCode(this.#buf.readUInt8(0));
      const total = 1 + this.#buf.readInt32BE(1);
      if (this.#buf.length < total) {
        return;
      }
      const body = Buffer.from(this.#buf.subarray(5, total));
      this.#buf = this.#buf.subarray(total);
      this.#message(type, new Reader(body));
    }
  }

  #startup(body: Buffer): void {
    this.server.messages.push("startup");
    const r = new Reader(body);
    const params: Record<string, string> = {};
    while (true) {
      const key = r.cstring();
      if (key === "") {
        break;
      }
      params[key] = r.cstring();
    }
    this.server.startups.push(params);
    this.#user = params["user"] ?? "";

    switch (this.opts.authMethod ?? "trust") {
      case "trust":
        this.#ready();
        break;
      case "password":
        this.#send(backend.authenticationCleartextPassword());
        break;
      case "md5":
        this.#send(backend.authenticationMD5Password(MD5_SALT));
        break;
      case "scram-sha-256":
        this.#send(backend.authenticationSASL("SCRAM-SHA-256"));
        break;
    }
  }

  #ready(): void {
    this.#send(
      backend.authenticationOk(),
      backend.parameterStatus("server_version", "16.4"),
      backend.parameterStatus("client_encoding", "UTF8"),
      backend.backendKeyData(),
      backend.readyForQuery(),
    );
  }

  #authFailed(): void {
    this.#send(
      backend.error(
        "FATAL",
        "28P01",
        `password authentication failed for user "${this.#user}"`,
      ),
    );
    this.#end();
  }

  #sasl(r: Reader): void {
    if (typeof this.#scram === "undefined") {
      r.cstring();
      r.int32();
      // gs2 header "n,," then the bare message
      const clientFirstBare = r.rest().slice(3);
      const clientNonce = clientFirstBare.slice(
        clientFirstBare.indexOf("r=") + 2,
      );
      const serverFirst = `r=${clientNonce}${SCRAM_SERVER_NONCE},s=${
        SCRAM_SALT.toString("base64")
      },i=${SCRAM_ITERATIONS}`;
      this.#scram = { clientFirstBare, serverFirst };
      this.#send(backend.authenticationSASLContinue(serverFirst));
      return;
    }

    const clientFinal = r.rest();
    const at = clientFinal.lastIndexOf(",p=");
    const withoutProof = clientFinal.slice(0, at);
    const proof = clientFinal.slice(at + 3);

    const salted = crypt.pbkdf2Sync(
      this.opts.password ?? "",
      SCRAM_SALT,
      SCRAM_ITERATIONS,
      32,
      "sha256",
    );
    const clientKey = hmac(salted, "Client Key");
    const storedKey = crypt.createHash("sha256").update(clientKey).digest();
    const authMessage =
      `${this.#scram.clientFirstBare},${this.#scram.serverFirst},${withoutProof}`;
    const expected = xor(clientKey, hmac(storedKey, authMessage));
    if (proof !== expected.toString("base64")) {
      this.#authFailed();
      return;
    }

    const serverKey = hmac(salted, "Server Key");
    this.#send(
      backend.authenticationSASLFinal(
        `v=${hmac(serverKey, authMessage).toString("base64")}`,
      ),
    );
    this.#ready();
  }

  #checkPassword(received: string): boolean {
    const expected = this.opts.password ?? "";
    if (this.opts.authMethod === "md5") {
      const inner = md5Hex(expected, this.#user);
      return received === `md5${md5Hex(inner, MD5_SALT)}`;
    }
    return received === expected;
  }

  #message(type: string, r: Reader): void {
    this.server.messages.push(type);

    if (this.#skipping && type !== "S") {
      return;
    }

    switch (type) {
      case "p": {
        if (this.opts.authMethod === "scram-sha-256") {
          this.#sasl(r);
          break;
        }
        const password = r.cstring();
        this.server.passwords.push(password);
        if (this.#checkPassword(password)) {
          this.#ready();
        } else {
          this.#authFailed();
        }
        break;
      }

      case "Q": {
        const sql = r.cstring();
        this.server.queries.push(sql);
        const outcome = (this.opts.query ?? defaultQuery)(sql);
        switch (outcome.kind) {
          case "command":
            this.#send(backend.commandComplete(outcome.tag));
            break;
          case "rows":
            this.#send(
              backend.rowDescription(outcome.fields),
              ...outcome.rows.map((row) => backend.dataRow(row)),
              backend.commandComplete(`SELECT ${outcome.rows.length}`),
            );
            break;
          case "empty":
            this.#send(backend.emptyQuery());
            break;
          case "error":
            this.#send(
              backend.error("ERROR", outcome.code ?? "XX000", outcome.message),
            );
            break;
        }
        this.#send(backend.readyForQuery());
        break;
      }

      case "P": {
        r.cstring();
        const text = r.cstring();
        const types: number[] = [];
        const n = r.int16();
        for (let i = 0; i < n; i++) {
          types.push(r.int32());
        }
        this.#parsed = { text, types };
        this.#send(backend.parseComplete());
        break;
      }

      case "B": {
        r.cstring();
        r.cstring();
        const formats: number[] = [];
        const nf = r.int16();
        for (let i = 0; i < nf; i++) {
          formats.push(r.int16());
        }
        const values: (Buffer | null)[] = [];
        const nv = r.int16();
        for (let i = 0; i < nv; i++) {
          const len = r.int32();
          values.push(len === -1 ? null : r.bytes(len));
        }
        const bound: Bound = { ...this.#parsed, formats, values };
        this.server.bound.push(bound);

        this.#outcome = (this.opts.execute ?? defaultExecute)(bound);
        if (this.#outcome.kind === "error") {
          this.#send(
            backend.error(
              "ERROR",
              this.#outcome.code ?? "XX000",
              this.#outcome.message,
            ),
          );
          this.#skipping = true;
        } else {
          this.#send(backend.bindComplete());
        }
        break;
      }

      case "D":
        if (this.#outcome.kind === "rows") {
          this.#send(backend.rowDescription(this.#outcome.fields));
        } else {
          this.#send(backend.noData());
        }
        break;

      case "E": {
        const outcome = this.#outcome;
        switch (outcome.kind) {
          case "command":
            if (typeof outcome.notice !== "undefined") {
              this.#send(backend.notice(outcome.notice));
            }
            this.#send(backend.commandComplete(outcome.tag));
            break;
          case "rows":
            if (typeof outcome.notice !== "undefined") {
              this.#send(backend.notice(outcome.notice));
            }
            this.#send(
              ...outcome.rows.map((row) => backend.dataRow(row)),
              backend.commandComplete(`INSERT 0 ${outcome.rows.length}`),
            );
            break;
          case "empty":
            this.#send(backend.emptyQuery());
            break;
          case "error":
            break;
        }
        break;
      }

      case "S":
        this.#skipping = false;
        this.#send(backend.readyForQuery());
        break;

      case "X":
        this.server.terminations++;
        this.#end();
        break;

      default:
        throw new Error(`fake backend: unexpected message ${type}`);
    }
  }
}

export function runPgServer(opts: RunOpts = {}): PgServer {
  const server: ServerState = {
    startups: [],
    passwords: [],
    queries: [],
    bound: [],
    messages: [],
    terminations: 0,
    terminated: () => server.terminations,
    dial: async () => new FakeConnection(opts, server).socket,
  };
  return server;
}

export type Collected = {
  stream: Writable;
  bytes: () => Buffer;
  text: () => string;
};

export function collect(): Collected {
  const chunks: Buffer[] = [];
  return {
    stream: new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    }),
    bytes: () => Buffer.concat(chunks),
    text: () => Buffer.concat(chunks).toString("utf8"),
  };
}
