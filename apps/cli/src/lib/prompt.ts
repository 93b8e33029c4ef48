import readline from "node:readline";

export type Ask = (question: string) => Promise<string>;

/** One question on the terminal; resolves to the trimmed answer. */
export function createTerminalAsk(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr
): Ask {
  return (question) => {
    const rl = readline.createInterface({ input, output });
    return new Promise((resolve) => {
      rl.question(question, (answer) => {
        rl.close();
        resolve(answer.trim());
      });
    });
  };
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === "y" || normalized === "yes";
}

/** Line source for long-running commands. */
export type CommandInput = AsyncIterable<string> & {
  pause(): void;
  resume(): void;
  close(): void;
};

export function openTerminalInput(input: NodeJS.ReadableStream = process.stdin): CommandInput {
  return readline.createInterface({ input, terminal: false });
}
