// src/models.ts

export type Gender = "male" | "female";
export type Interest = Gender | "both";

export const GENDERS: readonly Gender[] = ["male", "female"];
export const INTERESTS: readonly Interest[] = ["male", "female", "both"];

/** Numeric chat user id. Stored as its decimal string inside the document. */
export type UserId = number;

export interface UserRecord {
  telegram_id: number;
  photo_file_id: string;
  name: string;
  age: number; // >= 18, checked at intake only
  gender: Gender;
  interest: Interest;
  city: string;
  bio: string;
  registered: boolean;
  vip: boolean;
  coins: number; // reserved, nothing spends or earns it yet
  likes: string[];
  liked_by: string[];
  matches: string[];
  current_fake_index: number;
  current_real_index: number;
  created_at: number; // unix seconds
}

export interface DocumentMeta {
  created_by?: number;
  created_at?: number;
  last_init_by?: number;
  last_init_at?: number;
}

// The whole persisted state. Serialized as one JSON text.
export interface StoreDocument {
  users: Record<string, UserRecord>;
  meta: DocumentMeta;
  // Stored user entries that could not be read; written back unchanged.
  retained?: Record<string, unknown>;
}

export type RegistrationStep =
  | "photo"
  | "name"
  | "age"
  | "gender"
  | "interest"
  | "city"
  | "bio";

// What the registration flow has collected so far; nothing is persisted until bio.
export interface RegistrationDraft {
  photo_file_id?: string;
  name?: string;
  age?: number;
  gender?: Gender;
  interest?: Interest;
  city?: string;
  bio?: string;
}

export interface DecoyProfile {
  name: string;
  age: number;
  city: string;
  bio: string;
  photo: string;
}

export function userKey(id: UserId): string {
  return String(id);
}

export function emptyDocument(): StoreDocument {
  return { users: {}, meta: {} };
}
