// src/memoryBackend.ts
import { DocumentBackend } from "./documentBackend";
import { documentLength } from "./documentStore";

// Keeps the document text in process memory; nothing survives a restart.
export class MemoryBackend implements DocumentBackend {
  readonly maxPayloadSize: number;
  private text: string | null;
  private writeCount = 0;

  constructor(initial: string | null = null, maxPayloadSize = 4096) {
    this.text = initial;
    this.maxPayloadSize = maxPayloadSize;
  }

  async fetch(): Promise<string | null> {
    return this.text;
  }

  async replace(text: string): Promise<void> {
    const length = documentLength(text);
    if (length > this.maxPayloadSize) {
      throw new Error(`Payload of ${length} chars exceeds ${this.maxPayloadSize}`);
    }
    this.text = text;
    this.writeCount += 1;
  }

  get writes(): number {
    return this.writeCount;
  }

  get current(): string | null {
    return this.text;
  }
}
