// src/userRecord.ts
import {
  GENDERS,
  Gender,
  INTERESTS,
  Interest,
  RegistrationDraft,
  UserId,
  UserRecord,
} from "./models";

export const MIN_AGE = 18;
export const MAX_AGE = 120;
export const DEFAULT_COINS = 20;
export const NAME_MAX_LENGTH = 64;
export const DEFAULT_BIO_MAX_LENGTH = 200;

export type Validation<T> = { ok: true; value: T } | { ok: false; reason: string };

export interface ValidationRules {
  bioMaxLength: number;
  nameLettersOnly: boolean;
}

export const DEFAULT_RULES: ValidationRules = {
  bioMaxLength: DEFAULT_BIO_MAX_LENGTH,
  nameLettersOnly: false,
};

const LETTERS_ONLY = /^[\p{L}\s'-]+$/u;

export function validateName(text: string, rules: ValidationRules): Validation<string> {
  if (!text) return { ok: false, reason: "Name cannot be empty." };
  if (text.length > NAME_MAX_LENGTH) {
    return { ok: false, reason: `Name must be at most ${NAME_MAX_LENGTH} characters.` };
  }
  if (rules.nameLettersOnly && !LETTERS_ONLY.test(text)) {
    return { ok: false, reason: "Name may only contain letters." };
  }
  return { ok: true, value: text };
}

export function validateAge(text: string): Validation<number> {
  if (!/^\d+$/.test(text)) return { ok: false, reason: "Age must be a whole number." };
  const age = Number(text);
  if (age < MIN_AGE) return { ok: false, reason: `You must be at least ${MIN_AGE}.` };
  if (!Number.isSafeInteger(age) || age > MAX_AGE) {
    return { ok: false, reason: `Age must be at most ${MAX_AGE}.` };
  }
  return { ok: true, value: age };
}

export function validateGender(text: string): Validation<Gender> {
  const token = text.toLowerCase();
  const gender = GENDERS.find((g) => g === token);
  return gender ? { ok: true, value: gender } : { ok: false, reason: "Type 'male' or 'female'." };
}

export function validateInterest(text: string): Validation<Interest> {
  const token = text.toLowerCase();
  const interest = INTERESTS.find((i) => i === token);
  return interest
    ? { ok: true, value: interest }
    : { ok: false, reason: "Type 'male', 'female' or 'both'." };
}

export function validateCity(text: string): Validation<string> {
  return text ? { ok: true, value: text } : { ok: false, reason: "City cannot be empty." };
}

export function validateBio(text: string, rules: ValidationRules): Validation<string> {
  if (!text) return { ok: false, reason: "Bio cannot be empty." };
  if (Array.from(text).length > rules.bioMaxLength) {
    return { ok: false, reason: `Bio must be at most ${rules.bioMaxLength} characters.` };
  }
  return { ok: true, value: text };
}

/** Turns a complete draft into a fresh registered record; undefined if a field is missing. */
export function finalizeDraft(
  id: UserId,
  draft: RegistrationDraft,
  createdAt: number
): UserRecord | undefined {
  const { photo_file_id, name, age, gender, interest, city, bio } = draft;
  if (
    photo_file_id === undefined ||
    name === undefined ||
    age === undefined ||
    gender === undefined ||
    interest === undefined ||
    city === undefined ||
    bio === undefined
  ) {
    return undefined;
  }

  return {
    telegram_id: id,
    photo_file_id,
    name,
    age,
    gender,
    interest,
    city,
    bio,
    registered: true,
    vip: false,
    coins: DEFAULT_COINS,
    likes: [],
    liked_by: [],
    matches: [],
    current_fake_index: 0,
    current_real_index: 0,
    created_at: createdAt,
  };
}

// Set semantics over the persisted id arrays.
export function addId(list: string[], id: string): void {
  if (!list.includes(id)) list.push(id);
}

export function isInterestedIn(interest: Interest, gender: Gender): boolean {
  return interest === "both" || interest === gender;
}
