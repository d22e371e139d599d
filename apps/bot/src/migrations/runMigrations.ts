import { fileURLToPath } from "node:url";

import { defaultMigrationsDir, runSqlMigrations } from "./migrator.js";

const databaseUrl = process.env.DATABASE_URL ?? "";
if (!databaseUrl) throw new Error("DATABASE_URL is required");

await runSqlMigrations(databaseUrl, fileURLToPath(defaultMigrationsDir()));

// eslint-disable-next-line no-console
console.log("Migrations complete.");
