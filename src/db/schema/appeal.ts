import {
	pgTable,
	text,
	timestamp,
	unique,
	uuid,
} from "drizzle-orm/pg-core";
import { assessableItem } from "./assessableItem";

export const appeal = pgTable("appeal", {
	id: uuid("id").primaryKey().defaultRandom(),
	itemId: uuid("item_id").notNull().references(() => assessableItem.id, { onDelete: "cascade" }),
	learnerId: uuid("learner_id").notNull(),
	questionId: uuid("question_id").notNull(),
	explanation: text("explanation").notNull(),
	review: text("review").notNull().default(""),
	closedAt: timestamp("closed_at", { withTimezone: true }),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
	uniq: unique("appeal_item_learner_uniq").on(table.itemId, table.learnerId),
}));

export type AppealRow = typeof appeal.$inferSelect;
