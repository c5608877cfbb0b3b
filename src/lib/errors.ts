export class CommandNotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CommandNotFoundError";
  }
}

export class CommandExecutionError extends Error {
  readonly exitCode?: number;

  constructor(message: string, exitCode?: number) {
    super(message);
    this.name = "CommandExecutionError";
    this.exitCode = exitCode;
  }
}

export type CapabilityError = CommandNotFoundError | CommandExecutionError;

export function isCapabilityError(error: unknown): error is CapabilityError {
  return error instanceof CommandNotFoundError || error instanceof CommandExecutionError;
}
