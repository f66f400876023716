// src/admin.ts
import { DocumentStore, WriteFailure } from "./documentStore";
import { Messenger } from "./messenger";
import { UserId, userKey } from "./models";

export type AdminPredicate = (actorId: UserId) => boolean;

export type AdminResult =
  | { status: "ok" }
  | { status: "forbidden" }
  | { status: "not_found" }
  | { status: "failed"; reason: Exclude<WriteFailure, "not_found"> };

export type BroadcastResult =
  | { status: "ok"; delivered: number; attempted: number }
  | { status: "forbidden" }
  | { status: "invalid" }
  | { status: "unavailable" };

export function adminAllowList(ids: readonly number[]): AdminPredicate {
  const allowed = new Set(ids);
  return (actorId) => allowed.has(actorId);
}

function fromWrite(result: { ok: true } | { ok: false; reason: WriteFailure }): AdminResult {
  if (result.ok) return { status: "ok" };
  if (result.reason === "not_found") return { status: "not_found" };
  return { status: "failed", reason: result.reason };
}

export class AdminService {
  constructor(
    private store: DocumentStore,
    private messenger: Messenger,
    private isAdmin: AdminPredicate
  ) {}

  async init(actorId: UserId): Promise<AdminResult> {
    if (!this.isAdmin(actorId)) return { status: "forbidden" };
    console.log("[admin] initialize requested by", actorId);
    return fromWrite(await this.store.initialize(actorId));
  }

  async setVip(actorId: UserId, targetId: UserId, vip: boolean): Promise<AdminResult> {
    if (!this.isAdmin(actorId)) return { status: "forbidden" };

    const result = await this.store.transact((doc) => {
      const record = doc.users[userKey(targetId)];
      if (!record) return { value: false, dirty: false };
      record.vip = vip;
      return { value: true, dirty: true };
    });

    if (!result.ok) return { status: "failed", reason: result.reason };
    if (!result.value) return { status: "not_found" };
    console.log("[admin]", actorId, vip ? "granted VIP to" : "revoked VIP from", targetId);
    return { status: "ok" };
  }

  // Only the record goes; other users keep the id in their likes/matches.
  async deleteUser(actorId: UserId, targetId: UserId): Promise<AdminResult> {
    if (!this.isAdmin(actorId)) return { status: "forbidden" };
    const result = fromWrite(await this.store.deleteUser(targetId));
    if (result.status === "ok") console.log("[admin]", actorId, "deleted user", targetId);
    return result;
  }

  async broadcast(actorId: UserId, text: string): Promise<BroadcastResult> {
    if (!this.isAdmin(actorId)) return { status: "forbidden" };
    const message = text.trim();
    if (!message) return { status: "invalid" };

    const read = await this.store.read();
    if (!read.ok) return { status: "unavailable" };

    const recipients = Object.keys(read.document.users)
      .map(Number)
      .sort((a, b) => a - b);

    let delivered = 0;
    for (const recipient of recipients) {
      try {
        await this.messenger.sendText(recipient, message);
        delivered += 1;
      } catch (err) {
        console.warn("[admin] broadcast to", recipient, "failed:", err);
      }
    }

    console.log("[admin] broadcast delivered to", delivered, "of", recipients.length);
    return { status: "ok", delivered, attempted: recipients.length };
  }
}
