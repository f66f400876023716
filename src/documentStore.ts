// src/documentStore.ts
import dayjs from "dayjs";
import { DocumentBackend } from "./documentBackend";
import { parseDocument } from "./documentSchema";
import { StoreUnavailableError } from "./errors";
import { StoreDocument, UserId, UserRecord, emptyDocument, userKey } from "./models";

export const DEFAULT_MAX_CHARS = 3800;

export type ReadOrigin =
  | "persisted" // parsed from the backend
  | "blank" // backend has no canonical record yet
  | "fallback"; // backend failed or content was malformed; fail-open substituted an empty document

export type ReadResult =
  | { ok: true; document: StoreDocument; origin: ReadOrigin }
  | { ok: false; reason: "unavailable"; error: unknown };

export type SaveFailure = "too_large" | "backend_error";
export type SaveResult = { ok: true } | { ok: false; reason: SaveFailure };

export type TransactionFailure = SaveFailure | "unavailable";
// A failed save still hands back what the work computed.
export type TransactionResult<T> =
  | { ok: true; value: T }
  | { ok: false; reason: "unavailable" }
  | { ok: false; reason: SaveFailure; value: T };

export type WriteFailure = TransactionFailure | "not_found";
export type WriteResult = { ok: true } | { ok: false; reason: WriteFailure };

// Returned by transaction work: the document is written back only when dirty.
export interface Transaction<T> {
  value: T;
  dirty: boolean;
}

export interface DocumentStoreOptions {
  maxChars?: number;
  failOpen?: boolean;
  now?: () => number;
}

export function serializeDocument({ users, meta, retained }: StoreDocument): string {
  return JSON.stringify({ users: { ...retained, ...users }, meta }, null, 2);
}

// Counts code points, so a multi-unit emoji in a bio counts once.
export function documentLength(text: string): number {
  return Array.from(text).length;
}

/**
 * The whole data set as one JSON document behind a {@link DocumentBackend}.
 *
 * Every operation reads the full document and, when it changes something,
 * writes the full document back. Operations are queued so that two handlers
 * in this process never interleave a read-modify-write; a second process
 * writing to the same backend can still overwrite our changes.
 */
export class DocumentStore {
  readonly maxChars: number;
  private readonly failOpen: boolean;
  private readonly now: () => number;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private backend: DocumentBackend,
    options: DocumentStoreOptions = {}
  ) {
    this.maxChars = Math.min(options.maxChars ?? DEFAULT_MAX_CHARS, backend.maxPayloadSize);
    this.failOpen = options.failOpen ?? true;
    this.now = options.now ?? (() => dayjs().unix());
  }

  read(): Promise<ReadResult> {
    return this.exclusive(() => this.readUnlocked());
  }

  /** Throws {@link StoreUnavailableError} only when the store is fail-closed. */
  async load(): Promise<StoreDocument> {
    const result = await this.read();
    if (!result.ok) {
      throw new StoreUnavailableError(result.error);
    }
    return result.document;
  }

  save(doc: StoreDocument): Promise<SaveResult> {
    return this.exclusive(() => this.saveUnlocked(doc));
  }

  async getUser(id: UserId): Promise<UserRecord | undefined> {
    const doc = await this.load();
    return doc.users[userKey(id)];
  }

  async putUser(id: UserId, record: UserRecord): Promise<WriteResult> {
    const result = await this.transact((doc) => {
      const key = userKey(id);
      doc.users[key] = record;
      if (doc.retained) delete doc.retained[key];
      return { value: undefined, dirty: true };
    });
    return result.ok ? { ok: true } : { ok: false, reason: result.reason };
  }

  async deleteUser(id: UserId): Promise<WriteResult> {
    const result = await this.transact((doc) => {
      const key = userKey(id);
      if (key in doc.users) {
        delete doc.users[key];
      } else if (doc.retained && key in doc.retained) {
        delete doc.retained[key];
      } else {
        return { value: false, dirty: false };
      }
      return { value: true, dirty: true };
    });

    if (!result.ok) return { ok: false, reason: result.reason };
    return result.value ? { ok: true } : { ok: false, reason: "not_found" };
  }

  /**
   * Creates the empty document, or only stamps meta when users already exist.
   * Always writes.
   */
  async initialize(actorId: UserId): Promise<WriteResult> {
    const at = this.now();
    const result = await this.transact((doc) => {
      if (Object.keys({ ...doc.retained, ...doc.users }).length > 0) {
        doc.meta.last_init_by = actorId;
        doc.meta.last_init_at = at;
      } else {
        doc.users = {};
        doc.meta = { created_by: actorId, created_at: at };
      }
      return { value: undefined, dirty: true };
    });
    return result.ok ? { ok: true } : { ok: false, reason: result.reason };
  }

  /** Runs one read-modify-write with no other store operation in between. */
  transact<T>(work: (doc: StoreDocument) => Transaction<T>): Promise<TransactionResult<T>> {
    return this.exclusive(async (): Promise<TransactionResult<T>> => {
      const read = await this.readUnlocked();
      if (!read.ok) {
        return { ok: false, reason: "unavailable" };
      }

      const { value, dirty } = work(read.document);
      if (!dirty) {
        return { ok: true, value };
      }

      const saved = await this.saveUnlocked(read.document);
      return saved.ok ? { ok: true, value } : { ok: false, reason: saved.reason, value };
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // the caller gets the rejection through `run`; the queue itself keeps going
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async readUnlocked(): Promise<ReadResult> {
    let text: string | null;
    try {
      text = await this.backend.fetch();
    } catch (err) {
      console.error("[documentStore] failed to fetch document:", err);
      return this.unreadable(err);
    }

    if (text === null) {
      return { ok: true, document: emptyDocument(), origin: "blank" };
    }

    try {
      return { ok: true, document: parseDocument(text), origin: "persisted" };
    } catch (err) {
      console.warn("[documentStore] stored document is malformed:", err);
      return this.unreadable(err);
    }
  }

  private unreadable(error: unknown): ReadResult {
    if (this.failOpen) {
      return { ok: true, document: emptyDocument(), origin: "fallback" };
    }
    return { ok: false, reason: "unavailable", error };
  }

  private async saveUnlocked(doc: StoreDocument): Promise<SaveResult> {
    const text = serializeDocument(doc);
    const length = documentLength(text);
    if (length > this.maxChars) {
      console.error(
        `[documentStore] document too large to store (${length} > ${this.maxChars} chars)`
      );
      return { ok: false, reason: "too_large" };
    }

    try {
      await this.backend.replace(text);
      return { ok: true };
    } catch (err) {
      console.error("[documentStore] failed to save document:", err);
      return { ok: false, reason: "backend_error" };
    }
  }
}
