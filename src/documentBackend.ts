// src/documentBackend.ts
/**
 * Where the single store document physically lives.
 *
 * `fetch` resolves to null when no canonical record exists yet and rejects on
 * transport failure. `replace` updates the canonical record in place, or
 * creates one and makes it canonical.
 */
export interface DocumentBackend {
  readonly maxPayloadSize: number;
  fetch(): Promise<string | null>;
  replace(text: string): Promise<void>;
}
