export type CoreErrorCode =
  | "VALIDATION"
  | "NOT_FOUND"
  | "FORBIDDEN"
  | "CONFLICT"
  | "DATABASE"
  | "RETRIEVAL"
  | "EMBEDDING_UNAVAILABLE"
  | "DIMENSION_MISMATCH";

export class CoreError extends Error {
  constructor(
    message: string,
    public code: CoreErrorCode,
    public cause?: Error
  ) {
    super(message);
    this.name = "CoreError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
