import { afterEach, describe, expect, it, vi } from "vitest";

import { createTelegramClient, TelegramApiError } from "./client.js";

function jsonResponse(body: unknown, status = 200) {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("createTelegramClient", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("posts sendMessage as JSON to the bot endpoint", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ ok: true, result: { message_id: 7, chat: { id: 42 } } }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelegramClient({ token: "test-token", apiBase: "https://tg.example.test/" });
    const msg = await client.sendMessage(42, "hello", {
      reply_markup: { inline_keyboard: [[{ text: "Yes", callback_data: "confirm" }]] },
    });

    expect(msg.message_id).toBe(7);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://tg.example.test/bottest-token/sendMessage");
    expect(init?.method).toBe("POST");
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: 42,
      text: "hello",
      reply_markup: { inline_keyboard: [[{ text: "Yes", callback_data: "confirm" }]] },
    });
  });

  it("throws TelegramApiError when the API answers ok=false", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => jsonResponse({ ok: false, error_code: 400, description: "Bad Request: chat not found" }, 400)),
    );

    const client = createTelegramClient({ token: "test-token" });
    const err = await client.sendMessage(1, "x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TelegramApiError);
    expect(err instanceof TelegramApiError && err.message).toBe(
      "Telegram sendMessage failed: 400 Bad Request: chat not found",
    );
  });

  it("uploads documents as multipart form data", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse({ ok: true, result: { message_id: 8, chat: { id: 5 } } }),
    );
    vi.stubGlobal("fetch", fetchMock);

    const client = createTelegramClient({ token: "test-token" });
    await client.sendDocument(5, { fileName: "fuel.csv", content: Buffer.from("a,b\r\n"), caption: "Export" });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://api.telegram.org/bottest-token/sendDocument");
    const form = init?.body;
    expect(form).toBeInstanceOf(FormData);
    if (!(form instanceof FormData)) return;
    expect(form.get("chat_id")).toBe("5");
    expect(form.get("caption")).toBe("Export");
    const file = form.get("document");
    expect(file instanceof Blob && (await file.text())).toBe("a,b\r\n");
  });

  it("rejects a successful envelope whose result is not a message", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ ok: true, result: true })));

    const client = createTelegramClient({ token: "test-token" });
    const err = await client.sendMessage(1, "x").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(TelegramApiError);
    expect(err instanceof TelegramApiError && err.message).toBe("Telegram sendMessage failed: 200 result is not a message");
  });

  it("reads the setWebhook result as a boolean", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ ok: true, result: "yes" })));
    expect(await createTelegramClient({ token: "test-token" }).setWebhook("https://bot.example.test/hook")).toBe(false);

    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ ok: true, result: true })));
    expect(await createTelegramClient({ token: "test-token" }).setWebhook("https://bot.example.test/hook")).toBe(true);
  });
});
