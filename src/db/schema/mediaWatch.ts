import {
	boolean,
	doublePrecision,
	pgTable,
	text,
	timestamp,
	unique,
	uuid,
} from "drizzle-orm/pg-core";

/** Per-context watch result, written by the content delivery side. */
export const mediaWatch = pgTable("media_watch", {
	id: uuid("id").primaryKey().defaultRandom(),
	userId: uuid("user_id").notNull(),
	mediaId: uuid("media_id").notNull(),
	context: text("context").notNull().default(""),
	rate: doublePrecision("rate").notNull().default(0),
	passed: boolean("passed").notNull().default(false),
	updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
	uniq: unique("mw_user_media_context_uniq").on(table.userId, table.mediaId, table.context),
}));
