// src/telegramClient.ts
import axios, { AxiosInstance } from "axios";
import { TelegramApiError } from "./errors";

export interface TelegramMessage {
  message_id: number;
  chat: { id: number };
  text?: string;
  caption?: string;
}

export interface TelegramChat {
  id: number;
  pinned_message?: TelegramMessage;
}

export interface InlineButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboard {
  inline_keyboard: InlineButton[][];
}

interface BotApiResponse<T> {
  ok: boolean;
  result?: T;
  error_code?: number;
  description?: string;
}

/** The slice of the Bot API this bot uses. */
export interface TelegramApi {
  getChat(chatId: number | string): Promise<TelegramChat>;
  sendMessage(
    chatId: number | string,
    text: string,
    replyMarkup?: InlineKeyboard
  ): Promise<TelegramMessage>;
  sendPhoto(
    chatId: number | string,
    photo: string,
    caption?: string,
    replyMarkup?: InlineKeyboard
  ): Promise<TelegramMessage>;
  editMessageText(
    chatId: number | string,
    messageId: number,
    text: string
  ): Promise<void>;
  pinChatMessage(chatId: number | string, messageId: number): Promise<void>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
  setWebhook(url: string, secretToken?: string): Promise<void>;
}

export class TelegramClient implements TelegramApi {
  private http: AxiosInstance;

  constructor(token: string, timeoutMs = 5000) {
    this.http = axios.create({
      baseURL: `https://api.telegram.org/bot${token}/`,
      timeout: timeoutMs,
      // Bot API errors come back as JSON bodies with ok=false; read them instead of throwing
      validateStatus: () => true,
    });
  }

  private async call<T>(method: string, payload: Record<string, unknown>): Promise<T> {
    const res = await this.http.post<BotApiResponse<T>>(method, payload);
    const body = res.data;

    if (!body || !body.ok || body.result === undefined) {
      throw new TelegramApiError(
        method,
        body?.error_code ?? res.status,
        body?.description ?? `HTTP ${res.status}`
      );
    }
    return body.result;
  }

  getChat(chatId: number | string): Promise<TelegramChat> {
    return this.call<TelegramChat>("getChat", { chat_id: chatId });
  }

  sendMessage(
    chatId: number | string,
    text: string,
    replyMarkup?: InlineKeyboard
  ): Promise<TelegramMessage> {
    return this.call<TelegramMessage>("sendMessage", {
      chat_id: chatId,
      text,
      reply_markup: replyMarkup,
    });
  }

  sendPhoto(
    chatId: number | string,
    photo: string,
    caption?: string,
    replyMarkup?: InlineKeyboard
  ): Promise<TelegramMessage> {
    return this.call<TelegramMessage>("sendPhoto", {
      chat_id: chatId,
      photo,
      caption,
      reply_markup: replyMarkup,
    });
  }

  async editMessageText(
    chatId: number | string,
    messageId: number,
    text: string
  ): Promise<void> {
    await this.call<unknown>("editMessageText", {
      chat_id: chatId,
      message_id: messageId,
      text,
    });
  }

  async pinChatMessage(chatId: number | string, messageId: number): Promise<void> {
    await this.call<boolean>("pinChatMessage", {
      chat_id: chatId,
      message_id: messageId,
      disable_notification: true,
    });
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call<boolean>("answerCallbackQuery", {
      callback_query_id: callbackQueryId,
      text,
    });
  }

  async setWebhook(url: string, secretToken?: string): Promise<void> {
    console.log("[telegramClient] setting webhook to", url);
    await this.call<boolean>("setWebhook", {
      url,
      secret_token: secretToken,
      allowed_updates: ["message", "callback_query"],
    });
  }
}
