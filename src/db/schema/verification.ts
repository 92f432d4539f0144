import {
	boolean,
	index,
	pgTable,
	timestamp,
	uuid,
} from "drizzle-orm/pg-core";

/** Proof that a learner passed an OTP check for one consumer (item or course). */
export const verification = pgTable("verification", {
	id: uuid("id").primaryKey().defaultRandom(),
	userId: uuid("user_id").notNull(),
	consumerId: uuid("consumer_id").notNull(),
	success: boolean("success").notNull().default(false),
	createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
	consumedAt: timestamp("consumed_at", { withTimezone: true }),
}, (table) => ({
	byConsumer: index("ver_user_consumer_idx").on(table.userId, table.consumerId, table.createdAt),
}));
