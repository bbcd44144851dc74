import * as crypt from "node:crypto";
import { Buffer } from "node:buffer";

import {
  zAuthenticationMD5Password,
  zAuthenticationSASL,
  zAuthenticationSASLContinue,
  zAuthenticationSASLFinal,
} from "./types.js";
import type { Connection } from "./conn.js";
import type { CheckedOpts } from "./opts.js";
import { PasswordRequiredError } from "./errors.js";

type State = {
  // SCRAM-SHA-256
  nonce?: string | undefined;
  clientFirstBare?: string | undefined;
  serverSignature?: string | undefined;
};

function hmac(key: Buffer, data: string): Buffer {
  return crypt.createHmac("sha256", key).update(data).digest();
}

function xor(b1: Buffer, b2: Buffer): Buffer {
  if (b1.length !== b2.length) {
    throw new Error(`${b1.length} != ${b2.length}`);
  }

  const r = Buffer.alloc(b1.length);
  for (let i = 0; i < b1.length; i++) {
    r.writeUInt8(b1.readUInt8(i) ^ b2.readUInt8(i), i);
  }
  return r;
}

function requirePassword(opts: CheckedOpts): string {
  if (typeof opts.password === "undefined" || opts.password === "") {
    throw new PasswordRequiredError();
  }
  return opts.password;
}

export function md5Password(user: string, password: string, salt: Buffer): string {
  const h1 = crypt.createHash("md5").update(password).update(user).digest(
    "hex",
  );
  const h2 = crypt.createHash("md5").update(h1).update(salt).digest("hex");
  return `md5${h2}`;
}

async function writePasswordMessageMd5(
  conn: Connection,
  salt: Buffer,
  opts: CheckedOpts,
): Promise<void> {
  const password = requirePassword(opts);
  await conn.write("password", md5Password(opts.user, password, salt));
}

async function writePasswordPlain(
  conn: Connection,
  opts: CheckedOpts,
): Promise<void> {
  const password = requirePassword(opts);
  await conn.write("password", password);
}

async function writeSendSASLInitialResponseMessageScramSha256(
  state: State,
  conn: Connection,
  opts: CheckedOpts,
): Promise<void> {
  requirePassword(opts);

  // NOTE: Based on node-postgres
  // https://github.com/brianc/node-postgres/blob/ecff60dc8aa0bd1ad5ea8f4623af0756a86dc110/packages/pg/lib/crypto/sasl.js
  const nonce = crypt.randomBytes(18).toString("base64");
  const clientFirstBare = `n=*,r=${nonce}`;

  state.nonce = nonce;
  state.clientFirstBare = clientFirstBare;
  delete state.serverSignature;

  await conn.write(
    "sendSASLInitialResponseMessage",
    "SCRAM-SHA-256",
    `n,,${clientFirstBare}`,
  );
}

function parseAttributes(data: string): Map<string, string> {
  return new Map(
    data
      .split(",")
      .map((v) => {
        const s = v.indexOf("=");
        if (s < 0) {
          throw new Error(`SCRAM-SHA-256: malformed attribute ${v}`);
        }
        return [v.slice(0, s), v.slice(s + 1)];
      }),
  );
}

async function writeSendSCRAMClientFinalMessage(
  state: State,
  conn: Connection,
  opts: CheckedOpts,
  data: string,
): Promise<void> {
  if (typeof state.nonce === "undefined") {
    throw new Error("Invalid state");
  }

  const password = requirePassword(opts);

  const attrs = parseAttributes(data);
  const nonce = attrs.get("r");
  const salt = attrs.get("s");
  const iter = Number.parseInt(attrs.get("i") ?? "", 10);
  if (
    typeof nonce === "undefined" || typeof salt === "undefined" ||
    Number.isNaN(iter)
  ) {
    throw new Error("SCRAM-SHA-256: incomplete server-first-message");
  }
  if (!nonce.startsWith(state.nonce)) {
    throw new Error("SCRAM-SHA-256: nonce mismatch");
  }

  const salted = crypt.pbkdf2Sync(
    password,
    Buffer.from(salt, "base64"),
    iter,
    32,
    "sha256",
  );
  const clientKey = hmac(salted, "Client Key");
  const storedKey = crypt.createHash("sha256").update(clientKey).digest();

  const clientFinalWithoutProof = `c=biws,r=${nonce}`;
  const authMessage =
    `${state.clientFirstBare},${data},${clientFinalWithoutProof}`;
  const clientSignature = hmac(storedKey, authMessage);
  const clientProof = xor(clientKey, clientSignature);

  const serverKey = hmac(salted, "Server Key");
  state.serverSignature = hmac(serverKey, authMessage).toString("base64");

  await conn.write(
    "sendSCRAMClientFinalMessage",
    `${clientFinalWithoutProof},p=${clientProof.toString("base64")}`,
  );
}

/**
 * Answer the server's authentication requests until `AuthenticationOk`.
 *
 * Throws `PasswordRequiredError` when the server asks for a password and
 * none was supplied.
 */
export async function handleAuthentication(
  conn: Connection,
  opts: CheckedOpts,
): Promise<void> {
  const state: State = {};

  for await (const msg of conn.readUntilReady()) {
    switch (msg.name) {
      case "authenticationOk":
        return;

      case "authenticationCleartextPassword": {
        await writePasswordPlain(conn, opts);
        break;
      }

      case "authenticationMD5Password": {
        const { salt } = zAuthenticationMD5Password.parse(msg);
        await writePasswordMessageMd5(conn, salt, opts);
        break;
      }

      case "authenticationSASL": {
        const { mechanisms } = zAuthenticationSASL.parse(msg);
        if (!mechanisms.includes("SCRAM-SHA-256")) {
          throw new Error(
            `Not implemented ${msg.name} ${mechanisms.join(" ")}`,
          );
        }
        await writeSendSASLInitialResponseMessageScramSha256(state, conn, opts);
        break;
      }

      case "authenticationSASLContinue": {
        const { data } = zAuthenticationSASLContinue.parse(msg);
        await writeSendSCRAMClientFinalMessage(state, conn, opts, data);
        break;
      }

      case "authenticationSASLFinal": {
        const { data } = zAuthenticationSASLFinal.parse(msg);
        if (data !== `v=${state.serverSignature}`) {
          throw new Error("SCRAM-SHA-256 verification failure");
        }
        delete state.nonce;
        delete state.clientFirstBare;
        delete state.serverSignature;
        break;
      }

      default:
        throw new Error(`Not implemented ${msg.name}`);
    }
  }
}
