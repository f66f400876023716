import axios from "axios";
import { TelegramApiError } from "../src/errors";
import { TelegramClient } from "../src/telegramClient";
import { silenceConsole } from "./helpers";

beforeEach(silenceConsole);

interface BotCall {
  method: string;
  payload: unknown;
}

type Reply = { status: number; body: unknown };

// Routes every request of clients created afterwards to `reply` instead of the network.
function stubBotApi(reply: (call: BotCall) => Reply): BotCall[] {
  const calls: BotCall[] = [];
  const create = axios.create.bind(axios);

  jest.spyOn(axios, "create").mockImplementation((config) =>
    create({
      ...config,
      adapter: async (request) => {
        const call: BotCall = {
          method: request.url ?? "",
          payload: typeof request.data === "string" ? JSON.parse(request.data) : request.data,
        };
        calls.push(call);
        const { status, body } = reply(call);
        return { data: body, status, statusText: String(status), headers: {}, config: request };
      },
    })
  );
  return calls;
}

describe("TelegramClient", () => {
  it("posts the method payload and returns the result", async () => {
    const message = { message_id: 10, chat: { id: 5 }, text: "hi" };
    const calls = stubBotApi(() => ({ status: 200, body: { ok: true, result: message } }));
    const client = new TelegramClient("test-token");

    expect(await client.sendMessage(5, "hi")).toEqual(message);
    expect(calls).toEqual([{ method: "sendMessage", payload: { chat_id: 5, text: "hi" } }]);
  });

  it("turns an ok:false body into a TelegramApiError with the API code and description", async () => {
    stubBotApi(() => ({
      status: 400,
      body: { ok: false, error_code: 400, description: "Bad Request: message is not modified" },
    }));
    const client = new TelegramClient("test-token");

    const failure = client.editMessageText(-100, 7, "same text");

    await expect(failure).rejects.toBeInstanceOf(TelegramApiError);
    await expect(failure).rejects.toMatchObject({
      method: "editMessageText",
      code: 400,
      description: "Bad Request: message is not modified",
    });
  });

  it("falls back to the HTTP status when the body is not a Bot API response", async () => {
    stubBotApi(() => ({ status: 502, body: "Bad Gateway" }));
    const client = new TelegramClient("test-token");

    await expect(client.getChat(-100)).rejects.toMatchObject({
      method: "getChat",
      code: 502,
      description: "HTTP 502",
    });
  });

  it("registers the webhook for messages and callback queries", async () => {
    const calls = stubBotApi(() => ({ status: 200, body: { ok: true, result: true } }));
    const client = new TelegramClient("test-token");

    await client.setWebhook("https://bot.example.test/telegram/webhook", "test-secret");

    expect(calls).toEqual([
      {
        method: "setWebhook",
        payload: {
          url: "https://bot.example.test/telegram/webhook",
          secret_token: "test-secret",
          allowed_updates: ["message", "callback_query"],
        },
      },
    ]);
  });
});
