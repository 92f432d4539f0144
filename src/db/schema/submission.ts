import {
	jsonb,
	pgTable,
	text,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import type { AnswerMap, AttachmentMeta } from "../../types";
import { attempt } from "./attempt";

export const submission = pgTable("submission", {
	id: uuid("id").primaryKey().defaultRandom(),
	attemptId: uuid("attempt_id").notNull().unique("sub_attempt_uniq").references(() => attempt.id, { onDelete: "cascade" }),
	answers: jsonb("answers").$type<AnswerMap>().notNull(),
	extractedText: text("extracted_text").notNull().default(""),
	attachments: jsonb("attachments").$type<AttachmentMeta[]>().notNull().default([]),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});

export type SubmissionRow = typeof submission.$inferSelect;
