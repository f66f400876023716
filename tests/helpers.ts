import { DocumentStore, DocumentStoreOptions, serializeDocument } from "../src/documentStore";
import { MemoryBackend } from "../src/memoryBackend";
import { Messenger } from "../src/messenger";
import { DocumentMeta, StoreDocument, UserRecord } from "../src/models";
import type { InlineKeyboard } from "../src/telegramClient";

export const NOW = 1_700_000_000;

export class FlakyBackend extends MemoryBackend {
  failFetch = false;
  failReplace = false;

  async fetch(): Promise<string | null> {
    if (this.failFetch) throw new Error("fetch unavailable");
    return super.fetch();
  }

  async replace(text: string): Promise<void> {
    if (this.failReplace) throw new Error("replace unavailable");
    return super.replace(text);
  }
}

export interface SentMessage {
  to: number;
  text: string;
  photo?: string;
  keyboard?: InlineKeyboard;
}

export class RecordingMessenger implements Messenger {
  sent: SentMessage[] = [];
  unreachable = new Set<number>();

  async sendText(recipient: number, text: string, keyboard?: InlineKeyboard): Promise<void> {
    if (this.unreachable.has(recipient)) throw new Error(`chat ${recipient} not found`);
    this.sent.push({ to: recipient, text, keyboard });
  }

  async sendPhoto(
    recipient: number,
    photo: string,
    caption: string,
    keyboard?: InlineKeyboard
  ): Promise<void> {
    if (this.unreachable.has(recipient)) throw new Error(`chat ${recipient} not found`);
    this.sent.push({ to: recipient, text: caption, photo, keyboard });
  }
}

export function makeRecord(id: number, overrides: Partial<UserRecord> = {}): UserRecord {
  return {
    telegram_id: id,
    photo_file_id: `photo-${id}`,
    name: `User${id}`,
    age: 25,
    gender: "female",
    interest: "both",
    city: "Paris",
    bio: "Hi.",
    registered: true,
    vip: false,
    coins: 20,
    likes: [],
    liked_by: [],
    matches: [],
    current_fake_index: 0,
    current_real_index: 0,
    created_at: 1,
    ...overrides,
  };
}

export function documentWith(records: UserRecord[], meta: DocumentMeta = {}): StoreDocument {
  const users: Record<string, UserRecord> = {};
  for (const record of records) users[String(record.telegram_id)] = record;
  return { users, meta };
}

export function seededStore(
  records: UserRecord[],
  options: DocumentStoreOptions = {}
): { backend: FlakyBackend; store: DocumentStore } {
  const backend = new FlakyBackend(records.length ? serializeDocument(documentWith(records)) : null);
  const store = new DocumentStore(backend, { now: () => NOW, ...options });
  return { backend, store };
}

export function silenceConsole(): void {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
}
