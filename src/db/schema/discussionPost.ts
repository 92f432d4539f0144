import {
	type AnyPgColumn,
	index,
	pgTable,
	text,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import { attempt } from "./attempt";

export const discussionPost = pgTable("discussion_post", {
	id: uuid("id").primaryKey().defaultRandom(),
	attemptId: uuid("attempt_id").notNull().references(() => attempt.id, { onDelete: "cascade" }),
	parentId: uuid("parent_id").references((): AnyPgColumn => discussionPost.id, { onDelete: "cascade" }),
	title: text("title").notNull(),
	body: text("body").notNull(),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
	byAttempt: index("dp_attempt_idx").on(table.attemptId, table.createdAt),
}));

export type DiscussionPostRow = typeof discussionPost.$inferSelect;
