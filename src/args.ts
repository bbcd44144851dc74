import { Command, CommanderError, InvalidArgumentError, Option } from "commander";

import type { PasswordPolicy } from "./connector.js";
import { DOCUMENT_TYPES } from "./document.js";
import type { DocumentType } from "./document.js";
import type { InputSource } from "./input.js";
import { VERSION } from "./version.js";

export type Config = Readonly<{
  user?: string | undefined;
  prompt: PasswordPolicy;
  port?: number | undefined;
  host?: string | undefined;
  progname: string;
  verbose: boolean;
  type: DocumentType;
  command: string;
  input: InputSource;
  encoding?: string | undefined;
  database: string;
}>;

export type ParseResult =
  | { kind: "run"; config: Config; warnings: string[] }
  | { kind: "exit"; code: number };

export type ParseOpts = {
  progname: string;
  writeOut?: ((text: string) => void) | undefined;
  writeErr?: ((text: string) => void) | undefined;
};

type CliOptions = {
  host?: string;
  port?: number;
  username?: string;
  password?: boolean;
  command: string;
  file?: string;
  type: DocumentType;
  encoding?: string;
  verbose?: boolean;
};

export function parsePort(value: string): number {
  // strtol semantics: leading digits count, anything else is 0
  const port = Number.parseInt(value, 10);
  if (Number.isNaN(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError(`invalid port number: ${value}`);
  }
  return port;
}

function program({ progname, writeOut, writeErr }: ParseOpts): Command {
  const cmd = new Command()
    .name(progname)
    .description(
      `${progname} imports XML, TEXT or BYTEA documents to PostgreSQL.`,
    )
    .helpOption("-?, --help", "show this help, then exit")
    .version(
      `${progname} ${VERSION}`,
      "-V, --version",
      "output version information, then exit",
    )
    .argument("<dbname>", "database name or postgres:// connection URI")
    .allowExcessArguments(false)
    .exitOverride()
    .showHelpAfterError(`Try "${progname} --help" for more information.`)
    .addOption(
      new Option(
        "-E, --encoding <encoding>",
        "client encoding, sent as a quoted literal",
      ),
    )
    .addOption(new Option("-v, --verbose", "write a lot of progress messages"))
    .addOption(
      new Option("-c, --command <command>", "INSERT, UPDATE command with parameter")
        .makeOptionMandatory(),
    )
    .addOption(
      new Option("-f, --file <name>", "file NAME of imported document, default is stdin"),
    )
    .addOption(
      new Option("-t, --type <type>", "type specification")
        .choices(DOCUMENT_TYPES)
        .default("TEXT"),
    )
    .addOption(
      new Option("-h, --host <hostname>", "database server host or socket directory"),
    )
    .addOption(
      new Option("-p, --port <port>", "database server port").argParser(parsePort),
    )
    .addOption(new Option("-U, --username <username>", "user name to connect as"))
    // --password first: registered after it, --no-password adds no default
    .addOption(new Option("-W, --password", "force password prompt"))
    .addOption(new Option("-w, --no-password", "never prompt for password"));

  if (typeof writeOut !== "undefined" || typeof writeErr !== "undefined") {
    cmd.configureOutput({
      ...(writeOut ? { writeOut } : {}),
      ...(writeErr ? { writeErr } : {}),
    });
  }
  return cmd;
}

function promptPolicy(password: boolean | undefined): PasswordPolicy {
  switch (password) {
    case true:
      return "always";
    case false:
      return "never";
    default:
      return "default";
  }
}

/**
 * Turn the arguments after the script name into a `Config`. Help, version
 * and usage errors are written through commander and come back as an exit
 * code.
 */
export function parseArgs(
  argv: readonly string[],
  opts: ParseOpts,
): ParseResult {
  const cmd = program(opts);
  try {
    cmd.parse(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      return { kind: "exit", code: e.exitCode };
    }
    throw e;
  }

  const o = cmd.opts<CliOptions>();
  const [database] = cmd.args;
  if (typeof database === "undefined") {
    throw new Error("Unreachable: <dbname> is required");
  }

  const config: Config = {
    user: o.username,
    prompt: promptPolicy(o.password),
    port: o.port,
    host: o.host,
    progname: opts.progname,
    verbose: o.verbose === true,
    type: o.type,
    command: o.command,
    input: typeof o.file === "undefined" || o.file === "-"
      ? { kind: "stdin" }
      : { kind: "file", path: o.file },
    encoding: o.encoding,
    database,
  };

  const warnings: string[] = [];
  if (typeof config.encoding !== "undefined" && config.type !== "TEXT") {
    warnings.push(
      `${opts.progname}: warning: encoding is used only for type TEXT`,
    );
  }

  return { kind: "run", config: Object.freeze(config), warnings };
}
