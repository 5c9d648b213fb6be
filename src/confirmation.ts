import readline from "node:readline";
import type { ConfirmationRequest, ConfirmationResult, ConfirmLevel } from "./types.js";

export interface Confirmer {
  confirm(request: ConfirmationRequest): Promise<ConfirmationResult>;
}

export interface ReadlineConfirmerOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const PROMPTS: Record<ConfirmLevel, string> = {
  lite: "Execute this command? [Y/n] ",
  strict: "This command is high risk. Type YES to execute: ",
};

export function interpretAnswer(level: ConfirmLevel, answer: string): "approved" | "declined" {
  if (level === "strict") {
    return answer.trim() === "YES" ? "approved" : "declined";
  }
  const normalized = answer.trim().toLowerCase();
  return normalized === "" || normalized === "y" || normalized === "yes" ? "approved" : "declined";
}

/**
 * Asks on the terminal. Ctrl-C and end of input both count as interrupted.
 */
export class ReadlineConfirmer implements Confirmer {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: ReadlineConfirmerOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  confirm(request: ConfirmationRequest): Promise<ConfirmationResult> {
    if (request.reason) {
      this.output.write(`⚠️  ${request.reason}\n`);
    }

    const rl = readline.createInterface({ input: this.input, output: this.output });

    return new Promise<ConfirmationResult>((resolve) => {
      let settled = false;
      const finish = (result: ConfirmationResult): void => {
        if (settled) return;
        settled = true;
        rl.close();
        resolve(result);
      };

      rl.on("SIGINT", () => {
        this.output.write("\n");
        finish("interrupted");
      });
      rl.on("close", () => finish("interrupted"));
      rl.question(PROMPTS[request.level], (answer) => finish(interpretAnswer(request.level, answer)));
    });
  }
}
