import {
	pgTable,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";

export const publicAccessMedia = pgTable("public_access_media", {
	id: uuid("id").primaryKey().defaultRandom(),
	mediaId: uuid("media_id").notNull().unique("pam_media_uniq"),
	startAt: timestamp("start_at", { withTimezone: true }).notNull().defaultNow(),
	endAt: timestamp("end_at", { withTimezone: true }).notNull(),
	archiveAt: timestamp("archive_at", { withTimezone: true }).notNull(),
});
