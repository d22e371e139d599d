import type { ReplyMarkup, TelegramClient, Update } from "@fleetfuel/integration-telegram";

import type { BotResponse, EventInput, InboundEvent, Keyboard } from "../conversation/types.js";

export type RoutedUpdate = {
  chatId: number;
  event: InboundEvent;
  callbackQueryId?: string;
};

export function parseCommand(text: string): string | null {
  const m = /^\/([a-z0-9_]+)(?:@\w+)?(?:\s|$)/i.exec(text.trim());
  return m?.[1] ? m[1].toLowerCase() : null;
}

/** Maps an update to a transport-neutral event. Updates the bot does not handle yield null. */
export function toEvent(update: Update): RoutedUpdate | null {
  const cq = update.callback_query;
  if (cq) {
    const chatId = cq.message?.chat.id ?? cq.from.id;
    return {
      chatId,
      callbackQueryId: cq.id,
      event: { userId: String(cq.from.id), input: { kind: "callback", data: cq.data ?? "" } },
    };
  }

  const msg = update.message;
  if (!msg?.from) return null;

  let input: EventInput | null = null;
  // Telegram sends every size of a photo; the last one is the largest.
  const largest = msg.photo?.[msg.photo.length - 1];
  if (largest) {
    input = { kind: "photo", fileId: largest.file_id };
  } else if (msg.text !== undefined) {
    const command = parseCommand(msg.text);
    input = command ? { kind: "command", command } : { kind: "text", text: msg.text };
  }
  if (!input) return null;

  return { chatId: msg.chat.id, event: { userId: String(msg.from.id), input } };
}

export function toReplyMarkup(keyboard: Keyboard): ReplyMarkup {
  switch (keyboard.kind) {
    case "inline":
      return {
        inline_keyboard: keyboard.rows.map((row) => row.map((b) => ({ text: b.text, callback_data: b.data }))),
      };
    case "menu":
      return { keyboard: keyboard.rows.map((row) => row.map((t) => ({ text: t }))), resize_keyboard: true };
    case "remove":
      return { remove_keyboard: true };
  }
}

/** Sends the response messages in order. */
export async function deliver(client: TelegramClient, chatId: number, response: BotResponse): Promise<void> {
  for (const m of response.messages) {
    if (m.kind === "text") {
      await client.sendMessage(chatId, m.text, m.keyboard ? { reply_markup: toReplyMarkup(m.keyboard) } : undefined);
    } else {
      await client.sendDocument(chatId, {
        fileName: m.fileName,
        content: m.content,
        contentType: "text/csv",
        caption: m.caption,
      });
    }
  }
}
