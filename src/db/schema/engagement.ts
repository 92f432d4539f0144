import { sql } from "drizzle-orm";
import {
	boolean,
	pgTable,
	timestamp,
	uniqueIndex,
	uuid,
} from "drizzle-orm/pg-core";
import { course } from "./course";

export const engagement = pgTable("engagement", {
	id: uuid("id").primaryKey().defaultRandom(),
	courseId: uuid("course_id").notNull().references(() => course.id, { onDelete: "cascade" }),
	learnerId: uuid("learner_id").notNull(),
	active: boolean("active").notNull().default(true),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
}, (table) => ({
	oneActive: uniqueIndex("engagement_one_active_uniq")
		.on(table.courseId, table.learnerId)
		.where(sql`"active" = true`),
}));

export type EngagementRow = typeof engagement.$inferSelect;
