/**
 * Interactive prompts
 */

import * as readline from "readline";
import { Writable } from "stream";
import { BadParameterError } from "../errors.js";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Ask for a secret without echoing it
 *
 * The prompt goes to stderr so stdout stays usable for `export` lines.
 *
 * @throws {BadParameterError} if input closes (EOF, Ctrl-C) before a line is entered
 */
export async function promptPassword(
  message: string,
  streams: PromptStreams = { input: process.stdin, output: process.stderr }
): Promise<string> {
  const { input, output } = streams;
  output.write(message);

  let muted = true;
  const echo = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      if (!muted) {
        output.write(chunk);
      }
      callback();
    },
  });

  const rl = readline.createInterface({
    input,
    output: echo,
    terminal: "isTTY" in input && input.isTTY === true,
  });

  return new Promise((resolve, reject) => {
    let answered = false;

    rl.on("close", () => {
      if (!answered) {
        output.write("\n");
        reject(new BadParameterError("No password entered", "--pass"));
      }
    });

    rl.question("", (answer) => {
      answered = true;
      muted = false;
      rl.close();
      output.write("\n");
      resolve(answer);
    });
  });
}
