import { describe, it, expect } from "vitest";

import { StoreCommandError } from "../application/errors";
import { createPassRunner, runPassChecked } from "./pass-cli";

// children here close stdin straight away, before the runner writes to it
const CLOSE_STDIN_AND_FAIL = ["-c", "exec 0<&-; sleep 0.05; exit 3"];

describe("pass-cli", () => {
  it("reports the exit code of a child that never reads its input", async () => {
    const run = createPassRunner("sh");

    const results = await Promise.all(
      Array.from({ length: 10 }, () => run({ args: CLOSE_STDIN_AND_FAIL, input: "test-secret\nalice\n" }))
    );

    expect(results.map((r) => r.exitCode)).toEqual(Array.from({ length: 10 }, () => 3));
  });

  it("survives a broken pipe on large input", async () => {
    const run = createPassRunner("sh");

    const result = await run({ args: ["-c", "exec 0<&-; exit 4"], input: "x".repeat(4 * 1024 * 1024) });

    expect(result.exitCode).toBe(4);
  });

  it("collects stdout and passes input through", async () => {
    const run = createPassRunner("sh");

    const result = await run({ args: ["-c", "read line; echo \"got $line\""], input: "test-secret\n" });

    expect(result).toEqual({ exitCode: 0, stdout: "got test-secret\n", stderr: "" });
  });

  it("turns a non-zero exit into a StoreCommandError", async () => {
    const run = createPassRunner("sh");

    const failure = runPassChecked(run, { args: ["-c", "echo nope >&2; exit 2"] });

    await expect(failure).rejects.toBeInstanceOf(StoreCommandError);
    await expect(failure).rejects.toMatchObject({ exitCode: 2, stderr: "nope\n", command: "-c" });
  });
});
