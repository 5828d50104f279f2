export type ExportErrorCode =
  | "CONFIGURATION"
  | "INVALID_ARGUMENT"
  | "INVALID_LENGTH"
  | "EMPTY_INPUT"
  | "LISTENER"
  | "BROWSER_LAUNCH"
  | "AUTH_TIMEOUT"
  | "UPSTREAM"
  | "MALFORMED_PAYLOAD"
  | "INVALID_SELECTION"
  | "TIMESTAMP_PARSE"
  | "MALFORMED_TIMELINE"
  | "SERIALIZATION"
  | "PERSISTENCE";

export class ExportError extends Error {
  readonly code: ExportErrorCode;

  constructor(message: string, code: ExportErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ExportError";
    this.code = code;
  }
}

export function createExportError(
  message: string,
  code: ExportErrorCode,
  cause?: unknown
): ExportError {
  return new ExportError(message, code, cause === undefined ? undefined : { cause });
}

export function isExportError(error: unknown, code?: ExportErrorCode): error is ExportError {
  return error instanceof ExportError && (code === undefined || error.code === code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
