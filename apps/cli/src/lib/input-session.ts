import type { Session } from "@passdeck/core-application";

import type { CommandInput } from "./prompt";

/**
 * Wraps `inner` so that the command input is paused too while an external
 * program owns the terminal.
 */
export function pausingInput(inner: Session, input: CommandInput): Session {
  return {
    suspend<T>(work: () => Promise<T>): Promise<T> {
      return inner.suspend(async () => {
        input.pause();
        try {
          return await work();
        } finally {
          input.resume();
        }
      });
    },
  };
}
