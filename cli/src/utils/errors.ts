export type MenuErrorCode =
  | "TERMINAL_UNAVAILABLE"
  | "TERMINAL_READ_FAILED"
  | "INVALID_DEFINITION"
  | "SESSION_ACTIVE";

export class MenuError extends Error {
  readonly code: MenuErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: MenuErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

// The session cannot continue without keyboard input.
export class TerminalError extends MenuError {
  constructor(code: "TERMINAL_UNAVAILABLE" | "TERMINAL_READ_FAILED", message: string, cause?: unknown) {
    super(code, message, cause === undefined ? undefined : { cause: errorMessage(cause) });
  }
}

export class MenuDefinitionError extends MenuError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("INVALID_DEFINITION", message, details);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
