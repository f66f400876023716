// src/registration.ts
import dayjs from "dayjs";
import { DocumentStore, TransactionFailure, WriteFailure } from "./documentStore";
import { RegistrationDraft, RegistrationStep, UserId, UserRecord, userKey } from "./models";
import {
  DEFAULT_RULES,
  ValidationRules,
  finalizeDraft,
  validateAge,
  validateBio,
  validateCity,
  validateGender,
  validateInterest,
  validateName,
} from "./userRecord";

export type RegistrationInput =
  | { kind: "photo"; fileId: string }
  | { kind: "text"; text: string };

export type StartResult =
  | { status: "already_registered"; record: UserRecord }
  | { status: "started"; step: "photo" }
  | { status: "unavailable" };

export type InputResult =
  | { status: "no_session" }
  | { status: "unexpected_input"; step: RegistrationStep }
  | { status: "rejected"; step: RegistrationStep; reason: string }
  | { status: "advanced"; step: RegistrationStep }
  | { status: "completed"; record: UserRecord }
  | { status: "save_failed"; reason: WriteFailure };

export type PhotoUpdateResult =
  | { status: "updated" }
  | { status: "not_registered" }
  | { status: "failed"; reason: TransactionFailure };

const NEXT_STEP: Record<RegistrationStep, RegistrationStep | null> = {
  photo: "name",
  name: "age",
  age: "gender",
  gender: "interest",
  interest: "city",
  city: "bio",
  bio: null,
};

// Abandoned sessions are dropped after a day without input.
export const SESSION_TTL_SECONDS = 24 * 60 * 60;

interface RegistrationSession {
  step: RegistrationStep;
  draft: RegistrationDraft;
  touchedAt: number;
}

export interface RegistrationOptions {
  rules?: ValidationRules;
  now?: () => number;
  sessionTtlSeconds?: number;
}

/**
 * Linear sign-up flow: photo, name, age, gender, interest, city, bio.
 *
 * Sessions only live in memory until the bio step; then the record is written
 * once and the session is dropped whether or not the write succeeded.
 */
export class RegistrationFlow {
  private sessions = new Map<UserId, RegistrationSession>();
  private readonly rules: ValidationRules;
  private readonly now: () => number;
  private readonly sessionTtl: number;

  constructor(
    private store: DocumentStore,
    options: RegistrationOptions = {}
  ) {
    this.rules = options.rules ?? DEFAULT_RULES;
    this.now = options.now ?? (() => dayjs().unix());
    this.sessionTtl = options.sessionTtlSeconds ?? SESSION_TTL_SECONDS;
  }

  async start(userId: UserId): Promise<StartResult> {
    const read = await this.store.read();
    if (!read.ok) return { status: "unavailable" };

    const record = read.document.users[userKey(userId)];
    if (record?.registered) {
      this.sessions.delete(userId);
      return { status: "already_registered", record };
    }

    this.pruneExpired();
    this.sessions.set(userId, { step: "photo", draft: {}, touchedAt: this.now() });
    console.log("[registration] started for", userId);
    return { status: "started", step: "photo" };
  }

  cancel(userId: UserId): boolean {
    return this.sessions.delete(userId);
  }

  currentStep(userId: UserId): RegistrationStep | undefined {
    return this.activeSession(userId)?.step;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  async handleInput(userId: UserId, input: RegistrationInput): Promise<InputResult> {
    const session = this.activeSession(userId);
    if (!session) return { status: "no_session" };
    session.touchedAt = this.now();

    const { step, draft } = session;

    if (step === "photo") {
      if (input.kind !== "photo") return { status: "unexpected_input", step };
      draft.photo_file_id = input.fileId;
      return this.advance(session);
    }

    if (input.kind !== "text") return { status: "unexpected_input", step };
    const text = input.text.trim();

    switch (step) {
      case "name": {
        const name = validateName(text, this.rules);
        if (!name.ok) return { status: "rejected", step, reason: name.reason };
        draft.name = name.value;
        break;
      }
      case "age": {
        const age = validateAge(text);
        if (!age.ok) return { status: "rejected", step, reason: age.reason };
        draft.age = age.value;
        break;
      }
      case "gender": {
        const gender = validateGender(text);
        if (!gender.ok) return { status: "rejected", step, reason: gender.reason };
        draft.gender = gender.value;
        break;
      }
      case "interest": {
        const interest = validateInterest(text);
        if (!interest.ok) return { status: "rejected", step, reason: interest.reason };
        draft.interest = interest.value;
        break;
      }
      case "city": {
        const city = validateCity(text);
        if (!city.ok) return { status: "rejected", step, reason: city.reason };
        draft.city = city.value;
        break;
      }
      case "bio": {
        const bio = validateBio(text, this.rules);
        if (!bio.ok) return { status: "rejected", step, reason: bio.reason };
        draft.bio = bio.value;
        return this.finalize(userId, draft);
      }
    }

    return this.advance(session);
  }

  /** Replaces the photo of an already registered user. */
  async updatePhoto(userId: UserId, fileId: string): Promise<PhotoUpdateResult> {
    const result = await this.store.transact((doc) => {
      const record = doc.users[userKey(userId)];
      if (!record?.registered) return { value: false, dirty: false };
      record.photo_file_id = fileId;
      return { value: true, dirty: true };
    });

    if (!result.ok) return { status: "failed", reason: result.reason };
    return result.value ? { status: "updated" } : { status: "not_registered" };
  }

  private activeSession(userId: UserId): RegistrationSession | undefined {
    const session = this.sessions.get(userId);
    if (session && this.isExpired(session)) {
      this.sessions.delete(userId);
      console.log("[registration] session expired for", userId);
      return undefined;
    }
    return session;
  }

  private isExpired(session: RegistrationSession): boolean {
    return this.now() - session.touchedAt > this.sessionTtl;
  }

  private pruneExpired(): void {
    for (const [userId, session] of this.sessions) {
      if (this.isExpired(session)) this.sessions.delete(userId);
    }
  }

  private advance(session: RegistrationSession): InputResult {
    const next = NEXT_STEP[session.step];
    if (next === null) {
      throw new Error(`Registration step ${session.step} has no successor`);
    }
    session.step = next;
    return { status: "advanced", step: next };
  }

  private async finalize(userId: UserId, draft: RegistrationDraft): Promise<InputResult> {
    this.sessions.delete(userId);

    const record = finalizeDraft(userId, draft, this.now());
    if (!record) {
      throw new Error(`Registration draft for ${userId} is incomplete`);
    }

    const saved = await this.store.putUser(userId, record);
    if (!saved.ok) {
      console.error("[registration] could not save profile for", userId, "-", saved.reason);
      return { status: "save_failed", reason: saved.reason };
    }

    console.log("[registration] completed for", userId);
    return { status: "completed", record };
  }
}
