import {
	integer,
	pgTable,
	unique,
	uuid,
} from "drizzle-orm/pg-core";
import { assessableItem } from "./assessableItem";
import { course } from "./course";

/** Binds an assessable item into a course with a weight and a day-offset window. */
export const assessment = pgTable("assessment", {
	id: uuid("id").primaryKey().defaultRandom(),
	courseId: uuid("course_id").notNull().references(() => course.id, { onDelete: "cascade" }),
	itemId: uuid("item_id").notNull().references(() => assessableItem.id, { onDelete: "cascade" }),
	weight: integer("weight").notNull().default(0),
	startOffsetDays: integer("start_offset_days").notNull().default(0),
	// null: runs until the course window ends
	endOffsetDays: integer("end_offset_days"),
}, (table) => ({
	uniq: unique("assessment_course_item_uniq").on(table.courseId, table.itemId),
}));
