import {
	boolean,
	doublePrecision,
	jsonb,
	pgTable,
	text,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import { engagement } from "./engagement";

export interface CriterionResult {
	value: number;
	passingPoint: number;
	passed: boolean;
}

export const gradebook = pgTable("gradebook", {
	id: uuid("id").primaryKey().defaultRandom(),
	engagementId: uuid("engagement_id").notNull().unique("gb_engagement_uniq").references(() => engagement.id, { onDelete: "cascade" }),
	// criterion key ("completion" or assessed item id) → result, null when missing
	details: jsonb("details").$type<Record<string, CriterionResult | null>>().notNull(),
	score: doublePrecision("score").notNull(),
	completionRate: doublePrecision("completion_rate").notNull(),
	passed: boolean("passed").notNull(),
	confirmedAt: timestamp("confirmed_at", { withTimezone: true }),
	note: text("note").notNull().default(""),
	graderId: uuid("grader_id"),
	updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type GradebookRow = typeof gradebook.$inferSelect;
