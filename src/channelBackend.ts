// src/channelBackend.ts
import { DocumentBackend } from "./documentBackend";
import { TelegramApiError } from "./errors";
import type { TelegramApi } from "./telegramClient";

// Bot API limit for a text message.
export const TELEGRAM_TEXT_LIMIT = 4096;

/**
 * Stores the document as the text of the pinned message of a channel the bot
 * administers. The pinned message is the canonical record.
 */
export class ChannelBackend implements DocumentBackend {
  readonly maxPayloadSize = TELEGRAM_TEXT_LIMIT;

  constructor(
    private api: TelegramApi,
    private channelId: string
  ) {}

  async fetch(): Promise<string | null> {
    const chat = await this.api.getChat(this.channelId);
    const text = chat.pinned_message?.text;
    return text ? text : null;
  }

  async replace(text: string): Promise<void> {
    const chat = await this.api.getChat(this.channelId);
    const pinned = chat.pinned_message;

    if (pinned) {
      try {
        await this.api.editMessageText(this.channelId, pinned.message_id, text);
      } catch (err) {
        // Saving an unchanged document is not a failure.
        if (err instanceof TelegramApiError && err.description.includes("message is not modified")) {
          return;
        }
        throw err;
      }
      return;
    }

    console.log("[channelBackend] no pinned document in", this.channelId, "- creating one");
    const message = await this.api.sendMessage(this.channelId, text);
    await this.api.pinChatMessage(this.channelId, message.message_id);
  }
}
