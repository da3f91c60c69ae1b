import fs from "fs-extra";
import path from "path";
import type { Queryable } from "../pipeline/run_db";
import { withTransaction } from "../pipeline/run_db";
import { info } from "../pipeline/log";

export const MIGRATIONS_DIR = path.resolve("db/migrations");

async function ensureMigrationsTable(client: Queryable) {
  await client.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMP WITH TIME ZONE DEFAULT now()
    );
  `);
}

async function appliedMigrations(client: Queryable): Promise<Set<string>> {
  const res = await client.query("SELECT name FROM _migrations ORDER BY id ASC");
  return new Set(res.rows.map((r) => String(r.name)));
}

/** Applies each pending *.sql file in name order, one transaction per file. */
export async function runMigrations(client: Queryable, dir = MIGRATIONS_DIR): Promise<string[]> {
  await ensureMigrationsTable(client);
  const done = await appliedMigrations(client);
  await fs.ensureDir(dir);
  const files = (await fs.readdir(dir)).filter((f) => f.endsWith(".sql")).sort();
  const applied: string[] = [];
  for (const f of files) {
    if (done.has(f)) continue;
    const sql = await fs.readFile(path.join(dir, f), "utf8");
    await withTransaction(client, async (tx) => {
      await tx.query(sql);
      await tx.query("INSERT INTO _migrations(name) VALUES($1)", [f]);
    });
    info("migrate.applied", { name: f });
    applied.push(f);
  }
  return applied;
}
