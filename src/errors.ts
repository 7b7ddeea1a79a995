export class LiveSyncError extends Error {
  public readonly code: number;

  constructor(message: string, code: number) {
    super(message);
    this.name = "LiveSyncError";
    this.code = code;
  }
}

export const ExitCodes = {
  Success: 0,
  Failure: 1,
  Usage: 2,
  Validation: 3,
  Conflict: 4,
  Filesystem: 5
} as const;

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === "object" && error !== null && "code" in error;
}

export function formatError(error: unknown): string {
  if (isErrnoException(error) && typeof error.code === "string") {
    const message = error instanceof Error ? error.message : String(error);
    return message.startsWith(error.code) ? message : `${error.code}: ${message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
