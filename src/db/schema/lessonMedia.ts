import {
	index,
	pgTable,
	unique,
	uuid,
} from "drizzle-orm/pg-core";
import { lesson } from "./lesson";

export const lessonMedia = pgTable("lesson_media", {
	id: uuid("id").primaryKey().defaultRandom(),
	lessonId: uuid("lesson_id").notNull().references(() => lesson.id, { onDelete: "cascade" }),
	mediaId: uuid("media_id").notNull(),
}, (table) => ({
	uniq: unique("lm_lesson_media_uniq").on(table.lessonId, table.mediaId),
	byMedia: index("lm_media_idx").on(table.mediaId),
}));
