import {
	integer,
	pgTable,
	uuid,
} from "drizzle-orm/pg-core";
import { course } from "./course";

export const gradingPolicy = pgTable("grading_policy", {
	courseId: uuid("course_id").primaryKey().references(() => course.id, { onDelete: "cascade" }),
	assessmentWeight: integer("assessment_weight").notNull().default(100),
	completionWeight: integer("completion_weight").notNull().default(0),
	completionPassingPoint: integer("completion_passing_point").notNull().default(80),
});
