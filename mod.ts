export type {
  Client,
  ExecuteResult,
  Opts,
  Param,
  ResultField,
  SslMode,
} from "./src/api/index.js";
export { parseArgs } from "./src/args.js";
export type { Config, ParseResult } from "./src/args.js";
export { open } from "./src/client.js";
export type { Dialer, OpenOpts } from "./src/client.js";
export { connect, Session } from "./src/connector.js";
export type { ConnectorOpts, PasswordPolicy } from "./src/connector.js";
export { DOCUMENT_TYPES, documentParam } from "./src/document.js";
export type { DocumentType } from "./src/document.js";
export {
  ConnectionError,
  InputError,
  PasswordRequiredError,
  StatementError,
} from "./src/errors.js";
export {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  importDocument,
} from "./src/import.js";
export type { ImportDeps } from "./src/import.js";
export { MAX_DOCUMENT_SIZE, readDocument } from "./src/input.js";
export type { InputSource } from "./src/input.js";
export { promptPassword } from "./src/prompt.js";
export type { PasswordPrompt } from "./src/prompt.js";
