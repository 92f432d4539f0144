import { and, desc, eq, gte, isNull } from "drizzle-orm";
import env from "../config/env";
import { db, type Executor } from "../db/client";
import { verification } from "../db/schema";

export default class VerificationService {

	private freshRecordFilter(userId: string, consumerId: string) {
		const cutoff = new Date(Date.now() - env.VERIFICATION_EXPIRY_SECONDS * 1000);
		return and(
			eq(verification.userId, userId),
			eq(verification.consumerId, consumerId),
			eq(verification.success, true),
			isNull(verification.consumedAt),
			gte(verification.createdAt, cutoff),
		);
	}

	async isVerified(userId: string, consumerId: string, executor: Executor = db): Promise<boolean> {
		const [record] = await executor.select({ id: verification.id })
			.from(verification)
			.where(this.freshRecordFilter(userId, consumerId))
			.limit(1);
		return record !== undefined;
	}

	/**
	 * Marks the newest fresh record as used. Returns false when there is none
	 * or a concurrent caller consumed it first.
	 */
	async consume(userId: string, consumerId: string, executor: Executor = db): Promise<boolean> {
		const [candidate] = await executor.select({ id: verification.id })
			.from(verification)
			.where(this.freshRecordFilter(userId, consumerId))
			.orderBy(desc(verification.createdAt))
			.limit(1);
		if (!candidate) {
			return false;
		}

		const consumed = await executor.update(verification)
			.set({ consumedAt: new Date() })
			.where(and(eq(verification.id, candidate.id), isNull(verification.consumedAt)))
			.returning({ id: verification.id });
		return consumed.length > 0;
	}
}
