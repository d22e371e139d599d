import { ConfigError } from "../errors.js";

export type StoreDriver = "postgres" | "memory";

export type BotConfig = {
  port: number;
  host: string;
  apiBasePath: string;
  logLevel: string;

  storeDriver: StoreDriver;
  databaseUrl?: string;
  autoMigrate: boolean;

  telegramBotToken: string;
  telegramApiBase: string;
  telegramWebhookSecret?: string;
  telegramWebhookUrl?: string;
  adminApiKey?: string;

  dictionariesFile: string;
  allowedUsersFile: string;

  draftTtlMinutes: number;
  historyLimit: number;
};

type Env = Record<string, string | undefined>;

function optional(env: Env, name: string): string | undefined {
  return (env[name] ?? "").trim() || undefined;
}

function boundedInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ConfigError(`${name} must be an integer`);
  return Math.max(min, Math.min(max, n));
}

export function getConfig(env: Env = process.env): BotConfig {
  const port = boundedInt(env, "PORT", 3001, 1, 65535);
  const host = optional(env, "HOST") ?? "0.0.0.0";

  const storeDriver = (optional(env, "STORE_DRIVER") ?? "postgres").toLowerCase();
  if (storeDriver !== "postgres" && storeDriver !== "memory") {
    throw new ConfigError("STORE_DRIVER must be postgres|memory");
  }

  const databaseUrl = optional(env, "DATABASE_URL");
  if (storeDriver === "postgres" && !databaseUrl) throw new ConfigError("DATABASE_URL is required");

  const telegramBotToken = optional(env, "TELEGRAM_BOT_TOKEN");
  if (!telegramBotToken) throw new ConfigError("TELEGRAM_BOT_TOKEN is required");

  return {
    port,
    host,
    apiBasePath: optional(env, "API_BASE_PATH") ?? "/api",
    logLevel: optional(env, "LOG_LEVEL") ?? "info",

    storeDriver,
    databaseUrl,
    autoMigrate: (optional(env, "AUTO_MIGRATE") ?? "true") !== "false",

    telegramBotToken,
    telegramApiBase: optional(env, "TELEGRAM_API_BASE") ?? "https://api.telegram.org",
    telegramWebhookSecret: optional(env, "TELEGRAM_WEBHOOK_SECRET"),
    telegramWebhookUrl: optional(env, "TELEGRAM_WEBHOOK_URL"),
    adminApiKey: optional(env, "ADMIN_API_KEY"),

    dictionariesFile: optional(env, "DICTIONARIES_FILE") ?? "config/dictionaries.json",
    allowedUsersFile: optional(env, "ALLOWED_USERS_FILE") ?? "config/allowed_users.json",

    draftTtlMinutes: boundedInt(env, "DRAFT_TTL_MINUTES", 60, 1, 24 * 60),
    historyLimit: boundedInt(env, "HISTORY_LIMIT", 10, 1, 50),
  };
}
