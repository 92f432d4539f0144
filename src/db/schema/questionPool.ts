import {
	jsonb,
	pgTable,
	text,
	uuid,
} from "drizzle-orm/pg-core";

export const questionPool = pgTable("question_pool", {
	id: uuid("id").primaryKey().defaultRandom(),
	title: text("title").notNull(),
	// exam pools: number of questions drawn per format
	composition: jsonb("composition").$type<Record<string, number>>().notNull().default({}),
});

export type QuestionPoolRow = typeof questionPool.$inferSelect;
