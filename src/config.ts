// src/config.ts

export type StoreBackendKind = "channel" | "memory";

export interface AppConfig {
  botToken: string;
  dbChannelId: string;
  adminIds: number[];
  port: number;
  webhookUrl?: string;
  webhookSecret?: string;
  store: {
    backend: StoreBackendKind;
    maxChars: number;
    // true: a failed or malformed read is treated as an empty store
    failOpen: boolean;
  };
  registration: {
    bioMaxLength: number;
    nameLettersOnly: boolean;
  };
  telegram: {
    timeoutMs: number;
  };
}

type Env = Record<string, string | undefined>;

function getEnv(env: Env, name: string): string {
  const value = env[name];
  if (!value) throw new Error(`Missing env var: ${name}`);
  return value;
}

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function intFromEnv(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Env var ${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function boolFromEnv(env: Env, name: string, fallback: boolean): boolean {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  return ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

// "111, 222,abc" -> [111, 222]
export function parseAdminIds(raw: string | undefined): number[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((part) => part.trim())
    .filter((part) => /^\d+$/.test(part))
    .map(Number);
}

export function loadConfig(env: Env = process.env): AppConfig {
  const backend = optional(env, "STORE_BACKEND") ?? "channel";
  if (backend !== "channel" && backend !== "memory") {
    throw new Error(`Unknown STORE_BACKEND "${backend}"`);
  }

  return {
    botToken: getEnv(env, "BOT_TOKEN"),
    dbChannelId:
      backend === "channel" ? getEnv(env, "DB_CHANNEL_ID") : env.DB_CHANNEL_ID ?? "",
    adminIds: parseAdminIds(env.ADMIN_IDS),
    port: intFromEnv(env, "PORT", 3000),
    webhookUrl: optional(env, "WEBHOOK_URL"),
    webhookSecret: optional(env, "WEBHOOK_SECRET"),
    store: {
      backend,
      maxChars: intFromEnv(env, "STORE_MAX_CHARS", 3800),
      failOpen: boolFromEnv(env, "STORE_FAIL_OPEN", true),
    },
    registration: {
      bioMaxLength: intFromEnv(env, "REG_BIO_MAX_LENGTH", 200),
      nameLettersOnly: boolFromEnv(env, "REG_NAME_LETTERS_ONLY", false),
    },
    telegram: {
      timeoutMs: intFromEnv(env, "TELEGRAM_TIMEOUT_MS", 5000),
    },
  };
}
