import { sql } from "drizzle-orm";
import {
	boolean,
	index,
	pgTable,
	text,
	timestamp,
	uniqueIndex,
	uuid,
} from "drizzle-orm/pg-core";
import { assessableItem } from "./assessableItem";

export const attempt = pgTable("attempt", {
	id: uuid("id").primaryKey().defaultRandom(),
	itemId: uuid("item_id").notNull().references(() => assessableItem.id, { onDelete: "cascade" }),
	learnerId: uuid("learner_id").notNull(),
	context: text("context").notNull().default(""),
	questionIds: uuid("question_ids").array().notNull().default([]),
	startedAt: timestamp("started_at", { withTimezone: true }).notNull().defaultNow(),
	active: boolean("active").notNull().default(true),
}, (table) => ({
	// at most one active attempt per (item, learner, context), enforced by the database
	oneActive: uniqueIndex("attempt_one_active_uniq")
		.on(table.itemId, table.learnerId, table.context)
		.where(sql`"active" = true`),
	byLearner: index("attempt_learner_active_idx").on(table.learnerId, table.active),
}));

export type AttemptRow = typeof attempt.$inferSelect;
