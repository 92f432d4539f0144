import {
	index,
	integer,
	pgTable,
	text,
	uuid,
} from "drizzle-orm/pg-core";
import { course } from "./course";

export const lesson = pgTable("lesson", {
	id: uuid("id").primaryKey().defaultRandom(),
	courseId: uuid("course_id").notNull().references(() => course.id, { onDelete: "cascade" }),
	title: text("title").notNull(),
	ordering: integer("ordering").notNull().default(0),
	startOffsetDays: integer("start_offset_days").notNull().default(0),
	endOffsetDays: integer("end_offset_days"),
}, (table) => ({
	byCourse: index("lesson_course_idx").on(table.courseId, table.ordering),
}));
