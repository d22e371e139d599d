import { timingSafeEqual } from "node:crypto";

import type { FastifyPluginAsync, FastifyRequest } from "fastify";
import { Type } from "@sinclair/typebox";

import type { Update } from "@fleetfuel/integration-telegram";

import { errorMessage } from "../errors.js";
import { deliver, toEvent } from "../telegram/adapter.js";

// Only the envelope is checked; the adapter ignores fields it does not know.
const UpdateEnvelope = Type.Object({ update_id: Type.Integer() }, { additionalProperties: true });

function headerString(req: FastifyRequest, name: string): string | null {
  const v = req.headers[name];
  if (typeof v !== "string") return null;
  const s = v.trim();
  return s ? s : null;
}

function sameSecret(provided: string | null, expected: string): boolean {
  if (provided === null) return false;
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export const telegramRoutes: FastifyPluginAsync = async (app) => {
  const { conversation, telegram } = app.bot;

  app.post<{ Body: Update }>("/telegram/webhook", { schema: { body: UpdateEnvelope } }, async (req, reply) => {
    const secret = app.config.telegramWebhookSecret;
    if (secret && !sameSecret(headerString(req, "x-telegram-bot-api-secret-token"), secret)) {
      return reply.unauthorized("Invalid webhook secret");
    }

    const routed = toEvent(req.body);
    if (!routed) return { ok: true };

    try {
      const response = await conversation.handle(routed.event);
      await deliver(telegram, routed.chatId, response);
    } catch (e) {
      // Telegram redelivers on non-2xx; a failing update must not loop.
      req.log.error({ updateId: req.body.update_id, err: errorMessage(e) }, "telegram update failed");
    } finally {
      if (routed.callbackQueryId) {
        await telegram.answerCallbackQuery(routed.callbackQueryId).catch((e: unknown) => {
          req.log.warn({ err: errorMessage(e) }, "answerCallbackQuery failed");
        });
      }
    }

    return { ok: true };
  });

  app.post("/telegram/set-webhook", async (req, reply) => {
    const adminKey = app.config.adminApiKey;
    if (!adminKey || !sameSecret(headerString(req, "x-admin-key"), adminKey)) {
      return reply.unauthorized("Invalid admin key");
    }
    const url = app.config.telegramWebhookUrl;
    if (!url) return reply.badRequest("TELEGRAM_WEBHOOK_URL is not set");

    await telegram.setWebhook(url, app.config.telegramWebhookSecret);
    req.log.info({ url }, "telegram webhook registered");
    return { ok: true, url };
  });
};
