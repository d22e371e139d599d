import Fastify, { type FastifyBaseLogger } from "fastify";
import sensible from "@fastify/sensible";
import underPressure from "@fastify/under-pressure";
import { randomUUID } from "node:crypto";
import { fileURLToPath } from "node:url";

import { createTelegramClient, type TelegramClient } from "@fleetfuel/integration-telegram";

import { loadAccessGate, type AccessGate } from "./access/accessGate.js";
import { AnalyticsService } from "./analytics/analyticsService.js";
import { getConfig, type BotConfig } from "./config/env.js";
import { ConversationService } from "./conversation/conversationService.js";
import { createDb } from "./db.js";
import { ConfigError } from "./errors.js";
import { loadDictionaryProvider, type DictionaryProvider } from "./dictionaries/dictionaryProvider.js";
import type { FormState } from "./form/reportForm.js";
import { ReportFormService } from "./form/reportFormService.js";
import { HistoryReader } from "./history/historyReader.js";
import { defaultMigrationsDir, runSqlMigrations } from "./migrations/migrator.js";
import { telegramRoutes } from "./routes/telegram.js";
import { SessionManager } from "./sessions/sessionManager.js";
import { MemoryReportStore } from "./store/memoryReportStore.js";
import { PostgresReportStore } from "./store/postgresReportStore.js";
import type { ReportStore } from "./store/reportStore.js";

export type BotServices = {
  conversation: ConversationService;
  telegram: TelegramClient;
  store: ReportStore;
  sessions: SessionManager<FormState>;
};

declare module "fastify" {
  interface FastifyInstance {
    config: BotConfig;
    bot: BotServices;
  }
}

/** Collaborators a caller may supply instead of the ones built from config. */
export type AppOverrides = {
  config?: BotConfig;
  telegram?: TelegramClient;
  store?: ReportStore;
  gate?: AccessGate;
  dict?: DictionaryProvider;
  logger?: boolean;
};

const SWEEP_INTERVAL_MS = 5 * 60 * 1000;

async function createStore(config: BotConfig, log: FastifyBaseLogger): Promise<ReportStore> {
  if (config.storeDriver === "memory") {
    log.warn("using in-memory report store; reports are lost on restart");
    return new MemoryReportStore();
  }
  if (!config.databaseUrl) throw new ConfigError("DATABASE_URL is required");
  if (config.autoMigrate) {
    const applied = await runSqlMigrations(config.databaseUrl, fileURLToPath(defaultMigrationsDir()), {
      info: (msg) => log.info(msg),
    });
    log.info({ applied }, "migrations checked");
  }
  return new PostgresReportStore(createDb(config.databaseUrl));
}

export async function createApp(overrides: AppOverrides = {}) {
  const config = overrides.config ?? getConfig();
  const app = Fastify({
    logger: overrides.logger === false ? false : { level: config.logLevel },
    genReqId: (req) => {
      const provided = req.headers["x-request-id"];
      if (typeof provided === "string" && provided.trim()) return provided.trim();
      return randomUUID();
    },
  });

  const [gate, dict, store] = await Promise.all([
    overrides.gate ?? loadAccessGate(config.allowedUsersFile),
    overrides.dict ?? loadDictionaryProvider(config.dictionariesFile),
    overrides.store ?? createStore(config, app.log),
  ]);
  const telegram =
    overrides.telegram ?? createTelegramClient({ token: config.telegramBotToken, apiBase: config.telegramApiBase });

  const sessions = new SessionManager<FormState>({ ttlMs: config.draftTtlMinutes * 60 * 1000 });
  const conversation = new ConversationService({
    gate,
    dict,
    sessions,
    forms: new ReportFormService(sessions, dict, store, app.log),
    analytics: new AnalyticsService(store),
    history: new HistoryReader(store, config.historyLimit),
    log: app.log,
  });

  app.decorate("config", config);
  app.decorate("bot", { conversation, telegram, store, sessions });

  const sweep = setInterval(() => {
    const dropped = sessions.sweep();
    if (dropped) app.log.info({ dropped }, "expired drafts removed");
  }, SWEEP_INTERVAL_MS);
  sweep.unref();

  app.addHook("onClose", async () => {
    clearInterval(sweep);
    await store.close();
  });

  await app.register(sensible);
  await app.register(underPressure, {
    maxEventLoopDelay: 1000,
    message: "Server is under pressure",
  });

  const basePath = config.apiBasePath.trim() || "/api";
  app.get(`${basePath}/health`, async () => ({ ok: true, drafts: sessions.size }));
  await app.register(telegramRoutes, { prefix: basePath });

  return app;
}
