// src/server.ts
import express from "express";
import dotenv from "dotenv";

import { AdminService, adminAllowList } from "./admin";
import { BrowsingEngine } from "./browsing";
import { ChannelBackend } from "./channelBackend";
import { AppConfig, loadConfig } from "./config";
import { DocumentBackend } from "./documentBackend";
import { DocumentStore } from "./documentStore";
import { MemoryBackend } from "./memoryBackend";
import { TelegramMessenger } from "./messenger";
import { RegistrationFlow } from "./registration";
import { TelegramClient } from "./telegramClient";
import { UpdateRouter } from "./updateRouter";

export const WEBHOOK_PATH = "/telegram/webhook";
const SECRET_HEADER = "x-telegram-bot-api-secret-token";

export interface Bot {
  router: UpdateRouter;
  store: DocumentStore;
  telegram: TelegramClient;
}

export function createBot(config: AppConfig): Bot {
  const telegram = new TelegramClient(config.botToken, config.telegram.timeoutMs);

  const backend: DocumentBackend =
    config.store.backend === "memory"
      ? new MemoryBackend()
      : new ChannelBackend(telegram, config.dbChannelId);

  const store = new DocumentStore(backend, {
    maxChars: config.store.maxChars,
    failOpen: config.store.failOpen,
  });
  const messenger = new TelegramMessenger(telegram);

  const router = new UpdateRouter({
    registration: new RegistrationFlow(store, { rules: config.registration }),
    browsing: new BrowsingEngine(store, messenger),
    admin: new AdminService(store, messenger, adminAllowList(config.adminIds)),
    messenger,
    callbacks: telegram,
  });

  return { router, store, telegram };
}

export function createApp(
  router: Pick<UpdateRouter, "handle">,
  webhookSecret?: string
): express.Express {
  const app = express();
  app.use(express.json());

  // Simple health check
  app.get("/health", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  app.post(WEBHOOK_PATH, async (req, res) => {
    if (webhookSecret && req.get(SECRET_HEADER) !== webhookSecret) {
      console.warn("[server] webhook call with a bad secret token");
      return res.status(401).end();
    }

    try {
      await router.handle(req.body);
    } catch (err) {
      console.error("Error handling update:", err);
    }
    // Telegram redelivers on anything but 200, which would replay the update.
    return res.status(200).end();
  });

  return app;
}

async function main(): Promise<void> {
  dotenv.config();
  const config = loadConfig();
  const { router, telegram } = createBot(config);

  if (config.store.backend === "memory") {
    console.warn("[server] STORE_BACKEND=memory: data is lost on restart");
  }

  if (config.webhookUrl) {
    const url = `${config.webhookUrl.replace(/\/+$/, "")}${WEBHOOK_PATH}`;
    await telegram.setWebhook(url, config.webhookSecret);
  }

  createApp(router, config.webhookSecret).listen(config.port, () => {
    console.log(`Match bot listening on port ${config.port}`);
  });
}

if (require.main === module) {
  main().catch((err) => {
    console.error("Failed to start:", err);
    process.exit(1);
  });
}
