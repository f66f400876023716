import axios from "axios";
import { Server } from "http";
import { WEBHOOK_PATH, createApp } from "../src/server";
import { silenceConsole } from "./helpers";

beforeEach(silenceConsole);

let server: Server | undefined;

async function serve(handle: (raw: unknown) => Promise<void>, secret?: string): Promise<string> {
  const app = createApp({ handle }, secret);
  const listening = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  server = listening;

  const address = listening.address();
  if (address === null || typeof address === "string") {
    throw new Error("server has no TCP address");
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  const running = server;
  server = undefined;
  if (!running) return;
  running.closeAllConnections();
  await new Promise<void>((resolve, reject) => running.close((err) => (err ? reject(err) : resolve())));
});

const http = axios.create({ validateStatus: () => true });

describe("webhook app", () => {
  it("answers the health check", async () => {
    const base = await serve(async () => undefined);

    const res = await http.get(`${base}/health`);

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: "ok" });
  });

  it("passes the update body to the router", async () => {
    const handle = jest.fn(async (_raw: unknown) => undefined);
    const base = await serve(handle, "test-secret");

    const res = await http.post(`${base}${WEBHOOK_PATH}`, { update_id: 1 }, {
      headers: { "X-Telegram-Bot-Api-Secret-Token": "test-secret" },
    });

    expect(res.status).toBe(200);
    expect(handle).toHaveBeenCalledWith({ update_id: 1 });
  });

  it("rejects calls with a wrong secret token", async () => {
    const handle = jest.fn(async (_raw: unknown) => undefined);
    const base = await serve(handle, "test-secret");

    const wrong = await http.post(`${base}${WEBHOOK_PATH}`, { update_id: 1 }, {
      headers: { "X-Telegram-Bot-Api-Secret-Token": "other" },
    });
    const missing = await http.post(`${base}${WEBHOOK_PATH}`, { update_id: 2 });

    expect([wrong.status, missing.status]).toEqual([401, 401]);
    expect(handle).not.toHaveBeenCalled();
  });

  it("still answers 200 when handling the update fails", async () => {
    const base = await serve(async () => {
      throw new Error("router exploded");
    });

    const res = await http.post(`${base}${WEBHOOK_PATH}`, { update_id: 3 });

    expect(res.status).toBe(200);
    expect(console.error).toHaveBeenCalledWith("Error handling update:", expect.any(Error));
  });
});
