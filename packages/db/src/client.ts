import { readFileSync } from "node:fs";
import BetterSqlite3 from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";

import * as schema from "./schema";

const INIT_SQL_URL = new URL("../migrations/0000_init.sql", import.meta.url);

/**
 * Create the tables if they do not exist yet.
 */
export function applySchema(sqlite: BetterSqlite3.Database): void {
	const statements = readFileSync(INIT_SQL_URL, "utf8")
		.split("--> statement-breakpoint")
		.map((statement) => statement.trim())
		.filter((statement) => statement.length > 0);

	for (const statement of statements) {
		sqlite.exec(statement);
	}
}

/**
 * Create a Drizzle database client backed by a SQLite file.
 * Pass ":memory:" for a throwaway database.
 */
export function createDb(path: string) {
	const sqlite = new BetterSqlite3(path);
	sqlite.pragma("journal_mode = WAL");
	sqlite.pragma("foreign_keys = ON");
	applySchema(sqlite);
	return drizzle(sqlite, { schema });
}

export type Database = ReturnType<typeof createDb>;
