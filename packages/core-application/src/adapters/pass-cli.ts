import { spawn } from "node:child_process";

import { StoreCommandError } from "../application/errors";

export type PassInvocation = {
  args: string[];
  /** Written to stdin, which is then closed. */
  input?: string;
  /** Hand the terminal to the child (editor sessions). */
  interactive?: boolean;
};

export type PassResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export type PassRunner = (invocation: PassInvocation) => Promise<PassResult>;

export function createPassRunner(bin: string, env: NodeJS.ProcessEnv = process.env): PassRunner {
  return (invocation) =>
    new Promise<PassResult>((resolve, reject) => {
      const child = spawn(bin, invocation.args, {
        env,
        stdio: invocation.interactive ? "inherit" : ["pipe", "pipe", "pipe"],
      });

      let stdout = "";
      let stderr = "";

      child.stdout?.on("data", (chunk: Buffer) => {
        stdout += chunk.toString();
      });
      child.stderr?.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      child.on("error", (err) => {
        reject(new StoreCommandError(`Failed to start ${bin}: ${err.message}`, bin, null, stderr, err));
      });

      child.on("close", (code) => {
        resolve({ exitCode: code, stdout, stderr });
      });

      if (child.stdin) {
        // a child may exit without reading its input; its exit code decides the result
        child.stdin.on("error", (err: NodeJS.ErrnoException) => {
          if (err.code === "EPIPE" || err.code === "ERR_STREAM_DESTROYED") return;
          reject(new StoreCommandError(`Failed to write to ${bin}: ${err.message}`, bin, null, stderr, err));
        });
        if (invocation.input !== undefined) child.stdin.write(invocation.input);
        child.stdin.end();
      }
    });
}

/** Runs the command and turns a non-zero exit into a StoreCommandError. */
export async function runPassChecked(runner: PassRunner, invocation: PassInvocation): Promise<PassResult> {
  const result = await runner(invocation);
  if (result.exitCode !== 0) {
    const command = invocation.args[0] ?? "";
    throw new StoreCommandError(
      `pass ${command} exited with code ${result.exitCode}`,
      command,
      result.exitCode,
      result.stderr
    );
  }
  return result;
}
