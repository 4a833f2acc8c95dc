/**
 * Interactive credential prompts on the terminal.
 */

import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";

/**
 * Ask a question on stderr and return the trimmed answer. With `hidden`
 * the typed characters are not echoed.
 */
export async function ask(question: string, hidden = false): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) process.stderr.write(chunk);
      callback();
    },
  });

  const rl = createInterface({ input: process.stdin, output, terminal: true });
  try {
    const answer = rl.question(question);
    muted = hidden;
    const value = await answer;
    if (hidden) process.stderr.write("\n");
    return value.trim();
  } finally {
    rl.close();
  }
}

export interface Credentials {
  email: string;
  password: string;
}

export async function resolveCredentials(given: Partial<Credentials>): Promise<Credentials> {
  const email = given.email ?? (await ask("email: "));
  const password = given.password ?? (await ask("password: ", true));
  return { email, password };
}
