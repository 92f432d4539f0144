import {
	boolean,
	doublePrecision,
	pgTable,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";
import { engagement } from "./engagement";

/** Hand-off record picked up by the certificate renderer. */
export const certificateRequest = pgTable("certificate_request", {
	id: uuid("id").primaryKey().defaultRandom(),
	engagementId: uuid("engagement_id").notNull().unique("cr_engagement_uniq").references(() => engagement.id, { onDelete: "cascade" }),
	score: doublePrecision("score").notNull(),
	passed: boolean("passed").notNull(),
	requestedAt: timestamp("requested_at", { withTimezone: true }).notNull().defaultNow(),
});
