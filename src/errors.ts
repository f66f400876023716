// src/errors.ts
export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly code: number | undefined,
    readonly description: string
  ) {
    super(`Telegram ${method} failed${code ? ` (${code})` : ""}: ${description}`);
    this.name = "TelegramApiError";
  }
}

/** Thrown by fail-closed stores when the backend cannot produce a document. */
export class StoreUnavailableError extends Error {
  constructor(cause: unknown) {
    super("Document backend unavailable", { cause });
    this.name = "StoreUnavailableError";
  }
}
