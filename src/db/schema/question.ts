import {
	index,
	integer,
	jsonb,
	pgTable,
	text,
	uuid,
} from "drizzle-orm/pg-core";
import type { PointRequirements, QuestionFormat, RubricCriterion } from "../../types";
import { questionPool } from "./questionPool";

export const question = pgTable("question", {
	id: uuid("id").primaryKey().defaultRandom(),
	poolId: uuid("pool_id").notNull().references(() => questionPool.id, { onDelete: "cascade" }),
	format: text("format").$type<QuestionFormat>().notNull(),
	prompt: text("prompt").notNull(),
	options: text("options").array().notNull().default([]),
	point: integer("point").notNull().default(1),
	correctAnswers: text("correct_answers").array().notNull().default([]),
	rubric: jsonb("rubric").$type<RubricCriterion[]>().notNull().default([]),
	attachmentFileCount: integer("attachment_file_count").notNull().default(1),
	pointRequirements: jsonb("point_requirements").$type<PointRequirements>().notNull().default({}),
}, (table) => ({
	byPool: index("q_pool_idx").on(table.poolId, table.format),
}));

export type QuestionRow = typeof question.$inferSelect;
