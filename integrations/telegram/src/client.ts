import type { SendDocumentInput, SendMessageOptions, TelegramMessage } from "./types.js";

export type TelegramClientConfig = {
  token: string;
  apiBase?: string;
};

export interface TelegramClient {
  sendMessage(chatId: number, text: string, opts?: SendMessageOptions): Promise<TelegramMessage>;
  answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void>;
  sendDocument(chatId: number, doc: SendDocumentInput, opts?: SendMessageOptions): Promise<TelegramMessage>;
  setWebhook(url: string, secretToken?: string): Promise<boolean>;
}

export class TelegramApiError extends Error {
  constructor(
    readonly method: string,
    readonly status: number,
    readonly description: string,
  ) {
    super(`Telegram ${method} failed: ${status} ${description}`);
    this.name = "TelegramApiError";
  }
}

type ApiEnvelope<T> = { ok: true; result: T } | { ok: false; description?: string; error_code?: number };

function isEnvelope(value: unknown): value is ApiEnvelope<unknown> {
  return !!value && typeof value === "object" && "ok" in value && typeof value.ok === "boolean";
}

function isMessage(value: unknown): value is TelegramMessage {
  if (!value || typeof value !== "object") return false;
  if (!("message_id" in value) || typeof value.message_id !== "number") return false;
  if (!("chat" in value) || !value.chat || typeof value.chat !== "object") return false;
  return "id" in value.chat && typeof value.chat.id === "number";
}

export function createTelegramClient(cfg: TelegramClientConfig): TelegramClient {
  const base = `${(cfg.apiBase ?? "https://api.telegram.org").replace(/\/+$/, "")}/bot${cfg.token}`;

  async function call(method: string, body: RequestInit["body"], headers?: Record<string, string>): Promise<unknown> {
    const res = await fetch(`${base}/${method}`, { method: "POST", headers, body });
    const json: unknown = await res.json().catch(() => null);
    if (!isEnvelope(json)) throw new TelegramApiError(method, res.status, "invalid response body");
    if (!json.ok) throw new TelegramApiError(method, json.error_code ?? res.status, json.description ?? "unknown error");
    return json.result;
  }

  function callJson(method: string, payload: Record<string, unknown>): Promise<unknown> {
    return call(method, JSON.stringify(payload), { "content-type": "application/json" });
  }

  async function expectMessage(method: string, pending: Promise<unknown>): Promise<TelegramMessage> {
    const result = await pending;
    if (!isMessage(result)) throw new TelegramApiError(method, 200, "result is not a message");
    return result;
  }

  return {
    sendMessage(chatId, text, opts) {
      return expectMessage("sendMessage", callJson("sendMessage", { chat_id: chatId, text, ...opts }));
    },

    async answerCallbackQuery(callbackQueryId, text) {
      await callJson("answerCallbackQuery", { callback_query_id: callbackQueryId, text });
    },

    sendDocument(chatId, doc, opts) {
      const form = new FormData();
      form.set("chat_id", String(chatId));
      if (doc.caption) form.set("caption", doc.caption);
      if (opts?.reply_markup) form.set("reply_markup", JSON.stringify(opts.reply_markup));
      form.set("document", new Blob([new Uint8Array(doc.content)], { type: doc.contentType ?? "text/csv" }), doc.fileName);
      return expectMessage("sendDocument", call("sendDocument", form));
    },

    async setWebhook(url, secretToken) {
      const result = await callJson("setWebhook", {
        url,
        secret_token: secretToken,
        allowed_updates: ["message", "callback_query"],
      });
      return result === true;
    },
  };
}
