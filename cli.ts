#!/usr/bin/env node
import process from "node:process";

import { parseArgs } from "./src/args.js";
import { importDocument } from "./src/import.js";
import { promptPassword } from "./src/prompt.js";

const PROGNAME = "pgdocload";

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2), { progname: PROGNAME });
  if (parsed.kind === "exit") {
    return parsed.code;
  }

  for (const warning of parsed.warnings) {
    console.error(warning);
  }

  return await importDocument(parsed.config, {
    prompt: promptPassword,
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

process.exitCode = await main();
