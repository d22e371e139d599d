import { readdir, readFile } from "node:fs/promises";
import { join } from "node:path";

import postgres from "postgres";

type MigrationLogger = { info: (msg: string) => void };

// Arbitrary constant; keeps two bot instances from applying the same file twice.
const MIGRATION_LOCK_ID = 482_117;

export async function runSqlMigrations(
  databaseUrl: string,
  migrationsDir: string,
  log: MigrationLogger = { info: (msg) => console.log(msg) },
): Promise<string[]> {
  const sql = postgres(databaseUrl, { max: 1, idle_timeout: 10 });
  const appliedNow: string[] = [];

  try {
    await sql/* sql */ `
      CREATE TABLE IF NOT EXISTS schema_migrations (
        name TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `;
    await sql`SELECT pg_advisory_lock(${MIGRATION_LOCK_ID})`;

    const files = (await readdir(migrationsDir))
      .filter((f) => f.endsWith(".sql"))
      .sort((a, b) => a.localeCompare(b));

    for (const file of files) {
      const applied = await sql<{ name: string }[]>`
        SELECT name FROM schema_migrations WHERE name = ${file}
      `;
      if (applied.length) continue;

      const text = await readFile(join(migrationsDir, file), "utf8");
      log.info(`Applying migration: ${file}`);

      await sql.begin(async (tx) => {
        await tx.unsafe(text);
        await tx`
          INSERT INTO schema_migrations(name) VALUES (${file})
          ON CONFLICT DO NOTHING
        `;
      });
      appliedNow.push(file);
    }

    await sql`SELECT pg_advisory_unlock(${MIGRATION_LOCK_ID})`;
  } finally {
    await sql.end({ timeout: 5 });
  }

  return appliedNow;
}

export const defaultMigrationsDir = () => new URL("../../migrations/", import.meta.url);
