import { sql } from "drizzle-orm";
import {
	boolean,
	check,
	index,
	integer,
	pgTable,
	text,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import type { ItemKind } from "../../types";
import { questionPool } from "./questionPool";

/** Exams, assignments and discussion questions share one row shape; `kind` picks the behaviour. */
export const assessableItem = pgTable("assessable_item", {
	id: uuid("id").primaryKey().defaultRandom(),
	kind: text("kind").$type<ItemKind>().notNull(),
	title: text("title").notNull(),
	passingPoint: integer("passing_point").notNull().default(60),
	maxAttempts: integer("max_attempts").notNull().default(0),
	verificationRequired: boolean("verification_required").notNull().default(false),
	// exams only
	durationSeconds: integer("duration_seconds"),
	gradeDueDays: integer("grade_due_days").notNull().default(7),
	appealDeadlineDays: integer("appeal_deadline_days").notNull().default(3),
	confirmDueDays: integer("confirm_due_days").notNull().default(3),
	questionPoolId: uuid("question_pool_id").notNull().references(() => questionPool.id),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
	byKind: index("ai_kind_idx").on(table.kind),
	bounds: check("ai_bounds_check", sql`"passing_point" BETWEEN 0 AND 100 AND "max_attempts" >= 0`),
}));

export type AssessableItemRow = typeof assessableItem.$inferSelect;
