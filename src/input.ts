import { Buffer, constants } from "node:buffer";
import * as fs from "node:fs/promises";
import path from "node:path";
import type { Readable } from "node:stream";

import { InputError } from "./errors.js";

export type InputSource =
  | { kind: "stdin" }
  | { kind: "file"; path: string };

export const MAX_DOCUMENT_SIZE = 1024 * 1024 * 1024;

const CHUNK_SIZE = 1024;

function reason(e: unknown): string {
  if (e instanceof Error) {
    return e.message;
  }
  return String(e);
}

class Chunks {
  readonly #chunks: Buffer[] = [];
  #length = 0;

  push(chunk: Buffer): void {
    this.#length += chunk.length;
    if (this.#length > constants.MAX_LENGTH) {
      throw new InputError("Out of memory");
    }
    this.#chunks.push(chunk);
  }

  concat(): Buffer {
    return Buffer.concat(this.#chunks, this.#length);
  }
}

async function readStream(input: Readable): Promise<Buffer> {
  const chunks = new Chunks();
  try {
    for await (const chunk of input) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  } catch (e) {
    if (e instanceof InputError) {
      throw e;
    }
    throw new InputError(`Cannot read data 'stdin': ${reason(e)}`, {
      cause: e,
    });
  }
  return chunks.concat();
}

async function readFile(filename: string): Promise<Buffer> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(filename, "r");
  } catch (e) {
    throw new InputError(`Unable to open '${filename}': ${reason(e)}`, {
      cause: e,
    });
  }

  try {
    const stat = await handle.stat();
    if (stat.isFile() && stat.size > MAX_DOCUMENT_SIZE) {
      throw new InputError(`'${filename}' is too big (greater than 1GB)`);
    }

    const chunks = new Chunks();
    while (true) {
      const buffer = Buffer.alloc(CHUNK_SIZE);
      let bytesRead: number;
      try {
        ({ bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, null));
      } catch (e) {
        throw new InputError(`Cannot read data '${filename}': ${reason(e)}`, {
          cause: e,
        });
      }
      if (bytesRead === 0) {
        break;
      }
      chunks.push(buffer.subarray(0, bytesRead));
    }
    return chunks.concat();
  } finally {
    await handle.close();
  }
}

/**
 * Buffer the whole document. Regular files over `MAX_DOCUMENT_SIZE` are
 * rejected before anything is read.
 */
export async function readDocument(
  source: InputSource,
  stdin: Readable,
): Promise<Buffer> {
  switch (source.kind) {
    case "stdin":
      return await readStream(stdin);

    case "file":
      return await readFile(path.resolve(source.path));

    default:
      throw new Error(`Unreachable ${source satisfies never}`);
  }
}
