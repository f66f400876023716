// src/browsing.ts
import { decoyPool } from "./decoyProfiles";
import { DocumentStore, TransactionFailure } from "./documentStore";
import { Messenger } from "./messenger";
import { Interest, StoreDocument, UserId, UserRecord, userKey } from "./models";
import { addId, isInterestedIn } from "./userRecord";

export type ProfileCard =
  | {
      kind: "real";
      targetId: UserId;
      name: string;
      age: number;
      city: string;
      bio: string;
      photo?: string;
    }
  | { kind: "decoy"; name: string; age: number; city: string; bio: string; photo: string };

export type BrowseResult =
  | { status: "shown"; card: ProfileCard; position: number; poolSize: number }
  | { status: "empty"; pool: "real" | "decoy" }
  | { status: "not_registered" }
  | { status: "unavailable" };

export type LikeResult =
  | { status: "liked" }
  | { status: "matched"; requesterName: string; targetName: string; newMatch: boolean }
  | { status: "preview" }
  | { status: "not_registered" }
  | { status: "invalid_target" }
  | { status: "target_not_found" }
  | { status: "failed"; reason: TransactionFailure };

export type SkipResult =
  | { status: "skipped" }
  | { status: "preview" }
  | { status: "not_registered" }
  | { status: "unavailable" };

export type ProfileResult =
  | { status: "ok"; record: UserRecord }
  | { status: "not_registered" }
  | { status: "unavailable" };

export interface NamedId {
  id: string;
  name: string;
}

export type ConnectionsResult =
  | { status: "ok"; people: NamedId[] }
  | { status: "vip_required" }
  | { status: "not_registered" }
  | { status: "unavailable" };

interface Candidate {
  id: UserId;
  record: UserRecord;
}

/**
 * Registered users other than `self` whose gender fits `interest`, in
 * ascending id order so the cursor walks the same sequence on every read.
 */
export function realCandidates(doc: StoreDocument, self: UserId, interest: Interest): Candidate[] {
  const selfKey = userKey(self);
  return Object.entries(doc.users)
    .filter(([key, user]) => key !== selfKey && user.registered && isInterestedIn(interest, user.gender))
    .map(([key, record]) => ({ id: Number(key), record }))
    .sort((a, b) => a.id - b.id);
}

function realCard({ id, record }: Candidate): ProfileCard {
  return {
    kind: "real",
    targetId: id,
    name: record.name,
    age: record.age,
    city: record.city,
    bio: record.bio,
    photo: record.photo_file_id || undefined,
  };
}

export function matchNotice(partnerName: string): string {
  return `It's a match! You and ${partnerName} like each other.`;
}

export class BrowsingEngine {
  constructor(
    private store: DocumentStore,
    private messenger: Messenger
  ) {}

  /** Shows the next profile in the requester's pool and moves their cursor. */
  async browse(userId: UserId): Promise<BrowseResult> {
    const result = await this.store.transact<BrowseResult>((doc) => {
      const me = doc.users[userKey(userId)];
      if (!me?.registered) return { value: { status: "not_registered" }, dirty: false };

      if (me.vip) {
        const pool = realCandidates(doc, userId, me.interest);
        if (pool.length === 0) return { value: { status: "empty", pool: "real" }, dirty: false };

        const position = me.current_real_index % pool.length;
        me.current_real_index = (position + 1) % pool.length;
        const card = realCard(pool[position]);
        return { value: { status: "shown", card, position, poolSize: pool.length }, dirty: true };
      }

      const pool = decoyPool(me.interest);
      if (pool.length === 0) return { value: { status: "empty", pool: "decoy" }, dirty: false };

      const position = me.current_fake_index % pool.length;
      me.current_fake_index = (position + 1) % pool.length;
      const card: ProfileCard = { kind: "decoy", ...pool[position] };
      return { value: { status: "shown", card, position, poolSize: pool.length }, dirty: true };
    });

    if (result.ok) return result.value;
    if (result.reason === "unavailable") return { status: "unavailable" };

    // The profile can still be shown; only the cursor did not move.
    console.warn("[browsing] cursor not saved for", userId, "-", result.reason);
    return result.value;
  }

  /**
   * Records a like. When the target already likes the requester both records
   * gain each other as a match; both sides are written in one save.
   */
  async like(userId: UserId, targetId: UserId): Promise<LikeResult> {
    const myKey = userKey(userId);
    const targetKey = userKey(targetId);

    const result = await this.store.transact<LikeResult>((doc) => {
      const me = doc.users[myKey];
      if (!me?.registered) return { value: { status: "not_registered" }, dirty: false };
      if (!me.vip) return { value: { status: "preview" }, dirty: false };
      if (myKey === targetKey) return { value: { status: "invalid_target" }, dirty: false };

      const target = doc.users[targetKey];
      if (!target) return { value: { status: "target_not_found" }, dirty: false };

      addId(me.likes, targetKey);
      addId(target.liked_by, myKey);

      if (!target.likes.includes(myKey)) {
        return { value: { status: "liked" }, dirty: true };
      }

      const newMatch = !me.matches.includes(targetKey) || !target.matches.includes(myKey);
      addId(me.matches, targetKey);
      addId(target.matches, myKey);
      return {
        value: { status: "matched", requesterName: me.name, targetName: target.name, newMatch },
        dirty: true,
      };
    });

    if (!result.ok) {
      console.error("[browsing] like", userId, "->", targetId, "not saved -", result.reason);
      return { status: "failed", reason: result.reason };
    }

    const outcome = result.value;
    if (outcome.status === "matched" && outcome.newMatch) {
      await this.notifyMatch([
        [userId, outcome.targetName],
        [targetId, outcome.requesterName],
      ]);
    }
    return outcome;
  }

  async skip(userId: UserId, targetId: UserId): Promise<SkipResult> {
    const read = await this.store.read();
    if (!read.ok) return { status: "unavailable" };

    const me = read.document.users[userKey(userId)];
    if (!me?.registered) return { status: "not_registered" };
    if (!me.vip) return { status: "preview" };

    console.log("[browsing]", userId, "skipped", targetId);
    return { status: "skipped" };
  }

  async profile(userId: UserId): Promise<ProfileResult> {
    const read = await this.store.read();
    if (!read.ok) return { status: "unavailable" };

    const record = read.document.users[userKey(userId)];
    return record?.registered ? { status: "ok", record } : { status: "not_registered" };
  }

  matches(userId: UserId): Promise<ConnectionsResult> {
    return this.connections(userId, (record) => record.matches);
  }

  likedBy(userId: UserId): Promise<ConnectionsResult> {
    return this.connections(userId, (record) => record.liked_by);
  }

  private async connections(
    userId: UserId,
    pick: (record: UserRecord) => string[]
  ): Promise<ConnectionsResult> {
    const read = await this.store.read();
    if (!read.ok) return { status: "unavailable" };

    const { users } = read.document;
    const me = users[userKey(userId)];
    if (!me?.registered) return { status: "not_registered" };
    if (!me.vip) return { status: "vip_required" };

    // Deleted users stay referenced by id.
    const people = pick(me).map((id) => ({ id, name: users[id]?.name ?? id }));
    return { status: "ok", people };
  }

  // Each pair is [recipient, name of the person they matched with].
  private async notifyMatch(pairs: Array<[UserId, string]>): Promise<void> {
    for (const [recipient, partnerName] of pairs) {
      try {
        await this.messenger.sendText(recipient, matchNotice(partnerName));
      } catch (err) {
        console.error("[browsing] could not notify", recipient, "about a match:", err);
      }
    }
  }
}
