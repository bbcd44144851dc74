import * as fs from "node:fs";
import process from "node:process";
import * as readline from "node:readline";
import { Writable } from "node:stream";
import type { Readable } from "node:stream";
import * as tty from "node:tty";

export type PasswordPrompt = (message: string) => Promise<string>;

type Terminal = {
  input: Readable;
  output: Writable;
  close: () => void;
};

function openTerminal(): Terminal {
  let fd: number;
  try {
    fd = fs.openSync("/dev/tty", "r");
  } catch {
    // no controlling terminal
    return { input: process.stdin, output: process.stderr, close: () => {} };
  }
  const input = new tty.ReadStream(fd);
  return {
    input,
    output: process.stderr,
    close: () => input.destroy(),
  };
}

/**
 * Read one line from `input` without echoing it to `output`. Input that ends
 * before a newline gives an empty string.
 */
export async function readPassword(
  message: string,
  input: Readable,
  output: Writable,
): Promise<string> {
  // readline echoes what is typed to its output
  const sink = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });

  const rl = readline.createInterface({
    input,
    output: sink,
    terminal: true,
    historySize: 0,
  });
  try {
    output.write(message);
    return await new Promise<string>((resolve) => {
      rl.once("line", resolve);
      rl.once("close", () => resolve(""));
    });
  } finally {
    rl.close();
    output.write("\n");
  }
}

export const promptPassword: PasswordPrompt = async (message) => {
  const terminal = openTerminal();
  try {
    return await readPassword(message, terminal.input, terminal.output);
  } finally {
    terminal.close();
  }
};
