import readline from "readline";

import { EndOfInputError } from "./errors.js";

export interface Terminal {
  write(text: string): void;
  /** Resolves with the next input line; rejects with EndOfInputError once input is closed. */
  prompt(question: string): Promise<string>;
  close(): void;
}

export class ConsoleTerminal implements Terminal {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;
  private ended = false;
  private inputClosed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = readline.createInterface({ input, output, terminal: "isTTY" in output && output.isTTY === true });
    // Ctrl-C at a prompt ends the session like end of input.
    this.rl.on("SIGINT", () => {
      this.output.write("\n");
      this.rl.close();
    });
    this.rl.on("close", () => {
      this.inputClosed = true;
    });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  write(text: string): void {
    this.output.write(text.endsWith("\n") ? text : `${text}\n`);
  }

  async prompt(question: string): Promise<string> {
    if (this.ended) {
      throw new EndOfInputError();
    }
    if (this.inputClosed) {
      // Lines read before the input ended are still queued.
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }
    const next = await this.lines.next();
    if (next.done) {
      this.ended = true;
      throw new EndOfInputError();
    }
    return next.value;
  }

  close(): void {
    this.ended = true;
    this.rl.close();
  }
}
