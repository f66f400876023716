// src/messenger.ts
import type { InlineKeyboard, TelegramApi } from "./telegramClient";

/** Delivery to a user. Rejects when the recipient cannot be reached. */
export interface Messenger {
  sendText(recipient: number, text: string, keyboard?: InlineKeyboard): Promise<void>;
  sendPhoto(
    recipient: number,
    photo: string,
    caption: string,
    keyboard?: InlineKeyboard
  ): Promise<void>;
}

export class TelegramMessenger implements Messenger {
  constructor(private api: TelegramApi) {}

  async sendText(recipient: number, text: string, keyboard?: InlineKeyboard): Promise<void> {
    await this.api.sendMessage(recipient, text, keyboard);
  }

  async sendPhoto(
    recipient: number,
    photo: string,
    caption: string,
    keyboard?: InlineKeyboard
  ): Promise<void> {
    await this.api.sendPhoto(recipient, photo, caption, keyboard);
  }
}
