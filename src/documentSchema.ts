// src/documentSchema.ts
import { z } from "zod";
import { DocumentMeta, StoreDocument, UserRecord } from "./models";

const USER_KEY = /^-?\d+$/;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const lowercase = (value: unknown) => (typeof value === "string" ? value.trim().toLowerCase() : value);

// Keeps the usable ids of a relation list and drops anything else.
const idList = z.preprocess(
  (value) =>
    Array.isArray(value)
      ? value.filter((id) => typeof id === "string" || typeof id === "number").map(String)
      : [],
  z.array(z.string())
);

const cursor = z.number().int().nonnegative().catch(0);

// Identity fields must be readable; everything else falls back to what a
// fresh registration would hold, so records from older bot versions and
// hand-edited pins still load.
export const userRecordSchema: z.ZodType<UserRecord, z.ZodTypeDef, unknown> = z.object({
  telegram_id: z.number().int(),
  photo_file_id: z.string().catch(""),
  name: z.string(),
  age: z.number().int(),
  gender: z.preprocess(lowercase, z.enum(["male", "female"])),
  interest: z.preprocess(lowercase, z.enum(["male", "female", "both"])).catch("both"),
  city: z.string().catch(""),
  bio: z.string().catch(""),
  registered: z.boolean().catch(false),
  vip: z.boolean().catch(false),
  coins: z.number().int().catch(20),
  likes: idList,
  liked_by: idList,
  matches: idList,
  current_fake_index: cursor,
  current_real_index: cursor,
  created_at: z.number().int().catch(0),
});

const optionalInt = z.number().int().optional().catch(undefined);

export const metaSchema: z.ZodType<DocumentMeta, z.ZodTypeDef, unknown> = z
  .object({
    created_by: optionalInt,
    created_at: optionalInt,
    last_init_by: optionalInt,
    last_init_at: optionalInt,
  })
  .catch({});

/**
 * Parses the stored text. Only text that is not a JSON object is rejected;
 * a user entry that cannot be read goes to `retained` untouched and is
 * written back as it was.
 */
export function parseDocument(text: string): StoreDocument {
  const raw: unknown = JSON.parse(text);
  if (!isObject(raw)) {
    throw new Error("Stored document is not a JSON object");
  }

  const users: Record<string, UserRecord> = {};
  const retained: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(isObject(raw.users) ? raw.users : {})) {
    const parsed =
      USER_KEY.test(key) && isObject(value)
        ? userRecordSchema.safeParse({ telegram_id: Number(key), ...value })
        : undefined;

    if (parsed?.success) {
      users[key] = parsed.data;
    } else {
      console.warn("[documentSchema] keeping unreadable user entry", key, "as stored");
      retained[key] = value;
    }
  }

  const doc: StoreDocument = { users, meta: metaSchema.parse(raw.meta) };
  if (Object.keys(retained).length > 0) {
    doc.retained = retained;
  }
  return doc;
}
