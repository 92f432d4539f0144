import { PGlite } from "@electric-sql/pglite";
import { sql } from "drizzle-orm";
import { pushSchema } from "drizzle-kit/api";
import { drizzle } from "drizzle-orm/pglite";
import type { Database } from "./client";
import * as schema from "./schema";

const TABLES = [
	"certificate_request",
	"gradebook",
	"engagement",
	"media_watch",
	"lesson_media",
	"lesson",
	"assessment",
	"grading_policy",
	"course",
	"public_access_media",
	"enrollment",
	"verification",
	"discussion_post",
	"appeal",
	"grade",
	"submission",
	"scratch_answer",
	"attempt",
	"assessable_item",
	"question",
	"question_pool",
];

/**
 * In-process PostgreSQL for tests, with the tables, indexes and checks pushed
 * from the drizzle schema that also generates the production migrations.
 * Substitute it for `db/client` with `vi.mock`.
 */
export async function createTestDatabase() {
	const client = new PGlite();
	const database = drizzle(client, { schema });
	const { apply } = await pushSchema(schema, drizzle(client));
	await apply();
	return database;
}

export async function resetTestDatabase(database: Database) {
	await database.execute(sql.raw(`TRUNCATE ${TABLES.map(name => `"${name}"`).join(", ")} CASCADE`));
}
