import Fastify, { type FastifyBaseLogger } from "fastify";

import type { Dictionaries, NewReport } from "@fleetfuel/core";
import type {
  CallbackQuery,
  SendDocumentInput,
  SendMessageOptions,
  TelegramClient,
  TelegramMessage,
  Update,
} from "@fleetfuel/integration-telegram";

export const fixtureDictionaries: Dictionaries = {
  captains: ["Ivan", "Petr", "Oleg"],
  boats: ["Aurora", "Breeze", "Coral"],
  programs: ["Sunset Cruise", "Island Hop", "N/A"],
  piers: ["North Pier", "South Pier"],
};

export function silentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function newReport(overrides: Partial<NewReport> = {}): NewReport {
  return {
    boat: "Aurora",
    captain: "Ivan",
    program: "Sunset Cruise",
    privateRoute: null,
    pier: "North Pier",
    liters: 10,
    odometerPhotoId: null,
    receiptPhotoId: null,
    userId: "1001",
    ...overrides,
  };
}

/** Steps a clock forward by one minute per call, starting at `start`. */
export function tickingClock(start = new Date("2026-03-10T09:00:00Z")): () => Date {
  let t = start.getTime();
  return () => {
    const d = new Date(t);
    t += 60_000;
    return d;
  };
}

export type SentMessage = { chatId: number; text: string; options?: SendMessageOptions };
export type SentDocument = { chatId: number; doc: SendDocumentInput; options?: SendMessageOptions };

export class RecordingTelegramClient implements TelegramClient {
  readonly messages: SentMessage[] = [];
  readonly documents: SentDocument[] = [];
  readonly answered: string[] = [];
  readonly webhooks: { url: string; secretToken?: string }[] = [];
  private messageId = 500;

  async sendMessage(chatId: number, text: string, options?: SendMessageOptions): Promise<TelegramMessage> {
    this.messages.push({ chatId, text, options });
    return { message_id: this.messageId++, chat: { id: chatId }, text };
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    this.answered.push(callbackQueryId);
  }

  async sendDocument(chatId: number, doc: SendDocumentInput, options?: SendMessageOptions): Promise<TelegramMessage> {
    this.documents.push({ chatId, doc, options });
    return { message_id: this.messageId++, chat: { id: chatId } };
  }

  async setWebhook(url: string, secretToken?: string): Promise<boolean> {
    this.webhooks.push({ url, secretToken });
    return true;
  }
}

let updateSeq = 1;

const user = (id: number) => ({ id, is_bot: false, first_name: `User${id}` });

export function textUpdate(userId: number, text: string): Update {
  const message: TelegramMessage = {
    message_id: updateSeq,
    date: 1_700_000_000,
    chat: { id: userId, type: "private" },
    from: user(userId),
    text,
  };
  return { update_id: updateSeq++, message };
}

export function photoUpdate(userId: number, fileIds: string[]): Update {
  const message: TelegramMessage = {
    message_id: updateSeq,
    date: 1_700_000_000,
    chat: { id: userId, type: "private" },
    from: user(userId),
    photo: fileIds.map((file_id, i) => ({ file_id, file_unique_id: `${file_id}-u`, width: 90 * (i + 1), height: 90 * (i + 1) })),
  };
  return { update_id: updateSeq++, message };
}

export function callbackUpdate(userId: number, data: string): Update {
  const callback_query: CallbackQuery = {
    id: `cb-${updateSeq}`,
    from: user(userId),
    data,
    message: { message_id: updateSeq, date: 1_700_000_000, chat: { id: userId, type: "private" } },
  };
  return { update_id: updateSeq++, callback_query };
}
