export class ConfigError extends Error {
  constructor(message: string, public issues: string[] = []) {
    super(message);
    this.name = "ConfigError";
  }
}

export class StoreCommandError extends Error {
  constructor(
    message: string,
    public command: string,
    public exitCode: number | null,
    public stderr: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = "StoreCommandError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
