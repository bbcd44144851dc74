import process from "node:process";

import type { Client, Opts } from "./api/index.js";
import { open } from "./client.js";
import type { OpenOpts } from "./client.js";
import { PasswordRequiredError } from "./errors.js";
import { checkAndFillDefault } from "./opts.js";
import type { PasswordPrompt } from "./prompt.js";

export type PasswordPolicy = "default" | "never" | "always";

/**
 * Password remembered across connection attempts of one run.
 */
export class Session {
  readonly #prompt: PasswordPrompt;
  #password: string | undefined;
  #asked = false;

  constructor(prompt: PasswordPrompt) {
    this.#prompt = prompt;
  }

  get password(): string | undefined {
    return this.#password;
  }

  get asked(): boolean {
    return this.#asked;
  }

  async ask(): Promise<string> {
    const password = await this.#prompt("Password: ");
    this.#password = password;
    this.#asked = true;
    return password;
  }
}

export type ConnectorOpts = OpenOpts & {
  policy: PasswordPolicy;
  env?: NodeJS.ProcessEnv | undefined;
};

/**
 * Open a client, prompting for a password when the server wants one that
 * was not supplied. The prompt is shown at most once per session.
 */
export async function connect(
  session: Session,
  opts: Opts,
  { policy, env = process.env, ...openOpts }: ConnectorOpts,
): Promise<Client> {
  if (policy === "always" && !session.asked) {
    await session.ask();
  }

  while (true) {
    const checked = checkAndFillDefault({
      ...opts,
      password: opts.password ?? session.password,
    }, env);

    try {
      return await open(checked, openOpts);
    } catch (e) {
      if (
        e instanceof PasswordRequiredError &&
        !session.asked &&
        policy !== "never"
      ) {
        await session.ask();
        continue;
      }
      throw e;
    }
  }
}
