// ──────────────────────────────────────────────
// Switchboard - Schema Application
// Runs sql/*.sql in file order, one statement at a time
// ──────────────────────────────────────────────

import { readdir, readFile } from "node:fs/promises";
import { sql } from "drizzle-orm";
import { createLogger } from "@switchboard/utils";
import type { Database } from "./connection.js";

const logger = createLogger("database");

const SQL_DIR = new URL("../sql/", import.meta.url);
const STATEMENT_BREAKPOINT = "--> statement-breakpoint";

export function splitStatements(source: string): string[] {
  return source
    .split(STATEMENT_BREAKPOINT)
    .map((statement) => statement.trim())
    .filter((statement) => statement.length > 0);
}

export async function applySchema(db: Database): Promise<number> {
  const files = (await readdir(SQL_DIR)).filter((file) => file.endsWith(".sql")).sort();
  let applied = 0;

  for (const file of files) {
    const source = await readFile(new URL(file, SQL_DIR), "utf8");
    for (const statement of splitStatements(source)) {
      await db.execute(sql.raw(statement));
      applied += 1;
    }
    logger.debug({ file }, "Applied schema file");
  }

  return applied;
}
