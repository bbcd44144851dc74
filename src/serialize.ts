import { Buffer } from "node:buffer";

export type ParamFormat = "text" | "binary";

export type BindParam = {
  format: ParamFormat;
  value: Buffer | null;
};

export type BindOpts = {
  portal?: string | undefined;
  statement?: string | undefined;
  values: readonly BindParam[];
};

const FORMAT_CODE: Record<ParamFormat, number> = {
  text: 0,
  binary: 1,
};

const PROTOCOL_VERSION = 3 << 16;

function cstring(text: string): Buffer {
  return Buffer.from(`${text}\0`, "utf8");
}

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

/**
 * Serialize a Bind message carrying a format code per parameter.
 *
 * `pg-protocol` picks the format from the JS value (Buffer means binary),
 * which cannot express raw bytes in text format. Values are written as-is,
 * whatever their format. Results are requested in text format.
 */
export function serializeBind(opts: BindOpts): Buffer {
  const parts: Buffer[] = [
    cstring(opts.portal ?? ""),
    cstring(opts.statement ?? ""),
    int16(opts.values.length),
  ];
  for (const v of opts.values) {
    parts.push(int16(FORMAT_CODE[v.format]));
  }

  parts.push(int16(opts.values.length));
  for (const v of opts.values) {
    if (v.value === null) {
      parts.push(int32(-1));
    } else {
      parts.push(int32(v.value.length), v.value);
    }
  }

  parts.push(int16(0));

  const body = Buffer.concat(parts);
  const header = Buffer.alloc(5);
  header.write("B", 0, "latin1");
  header.writeInt32BE(body.length + 4, 1);
  return Buffer.concat([header, body]);
}

/**
 * Serialize a StartupMessage with exactly the given parameters. Unlike
 * `pg-protocol`, no `client_encoding` is added, so the session keeps the
 * server's default unless one is passed.
 */
export function serializeStartup(params: Record<string, string>): Buffer {
  const parts: Buffer[] = [int32(PROTOCOL_VERSION)];
  for (const [key, value] of Object.entries(params)) {
    parts.push(cstring(key), cstring(value));
  }
  parts.push(Buffer.from([0]));

  const body = Buffer.concat(parts);
  return Buffer.concat([int32(body.length + 4), body]);
}
