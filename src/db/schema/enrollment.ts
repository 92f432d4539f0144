import { sql } from "drizzle-orm";
import {
	boolean,
	pgTable,
	text,
	timestamp,
	uniqueIndex,
	uuid,
} from "drizzle-orm/pg-core";
import type { ContentKind } from "../../types";

export const enrollment = pgTable("enrollment", {
	id: uuid("id").primaryKey().defaultRandom(),
	userId: uuid("user_id").notNull(),
	contentKind: text("content_kind").$type<ContentKind>().notNull(),
	contentId: uuid("content_id").notNull(),
	active: boolean("active").notNull().default(true),
	startAt: timestamp("start_at", { withTimezone: true }).notNull().defaultNow(),
	endAt: timestamp("end_at", { withTimezone: true }).notNull(),
	archiveAt: timestamp("archive_at", { withTimezone: true }).notNull(),
	enrolledAt: timestamp("enrolled_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
	oneActive: uniqueIndex("enrollment_one_active_uniq")
		.on(table.userId, table.contentKind, table.contentId)
		.where(sql`"active" = true`),
}));
