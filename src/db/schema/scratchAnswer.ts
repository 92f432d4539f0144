import {
	jsonb,
	pgTable,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import type { AnswerMap } from "../../types";
import { attempt } from "./attempt";

export const scratchAnswer = pgTable("scratch_answer", {
	id: uuid("id").primaryKey().defaultRandom(),
	attemptId: uuid("attempt_id").notNull().unique("sa_attempt_uniq").references(() => attempt.id, { onDelete: "cascade" }),
	answers: jsonb("answers").$type<AnswerMap>().notNull().default({}),
	updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});

export type ScratchAnswerRow = typeof scratchAnswer.$inferSelect;
