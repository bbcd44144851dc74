import type { Buffer } from "node:buffer";

import type { Param } from "./api/index.js";

export const DOCUMENT_TYPES = ["XML", "TEXT", "BYTEA"] as const;

export type DocumentType = (typeof DOCUMENT_TYPES)[number];

// pg_type oids
export const XMLOID = 142;
export const BYTEAOID = 17;
export const UNSPECIFIED = 0;

/**
 * XML and BYTEA go in binary format tagged with their type, so the server
 * takes the bytes verbatim. TEXT goes untyped in text format and is subject
 * to client_encoding conversion.
 */
export function documentParam(type: DocumentType, data: Buffer): Param {
  switch (type) {
    case "XML":
      return { type: XMLOID, format: "binary", value: data };

    case "BYTEA":
      return { type: BYTEAOID, format: "binary", value: data };

    case "TEXT":
      return { type: UNSPECIFIED, format: "text", value: data };

    default:
      throw new Error(`Unreachable ${type satisfies never}`);
  }
}
