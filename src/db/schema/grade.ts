import { sql } from "drizzle-orm";
import {
	boolean,
	check,
	doublePrecision,
	integer,
	jsonb,
	pgTable,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import type { EarnedDetails } from "../../types";
import { attempt } from "./attempt";

export const grade = pgTable("grade", {
	id: uuid("id").primaryKey().defaultRandom(),
	attemptId: uuid("attempt_id").notNull().unique("grade_attempt_uniq").references(() => attempt.id, { onDelete: "cascade" }),
	earnedDetails: jsonb("earned_details").$type<EarnedDetails>().notNull().default({}),
	possiblePoint: integer("possible_point").notNull().default(0),
	earnedPoint: integer("earned_point").notNull().default(0),
	score: doublePrecision("score").notNull().default(0),
	passed: boolean("passed").notNull().default(false),
	feedback: jsonb("feedback").$type<Record<string, string>>().notNull().default({}),
	completedAt: timestamp("completed_at", { withTimezone: true }),
	confirmedAt: timestamp("confirmed_at", { withTimezone: true }),
	graderId: uuid("grader_id"),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
}, () => ({
	confirmAfterComplete: check("grade_confirm_after_complete", sql`"confirmed_at" IS NULL OR "completed_at" IS NOT NULL`),
}));

export type GradeRow = typeof grade.$inferSelect;
