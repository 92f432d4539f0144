import { and, eq } from "drizzle-orm";
import { db } from "../db/client";
import { course, engagement, type EngagementRow } from "../db/schema";
import { isUniqueViolation, LearningError } from "../helpers/LearningError";
import logger from "../helpers/Logger";
import VerificationService from "./VerificationService";

const log = logger.child("engagement");

const CONTEXT_PREFIX = "course";
const CONTEXT_SEPARATOR = "::";

export function issueContext(row: Pick<EngagementRow, "id" | "courseId">): string {
	return [CONTEXT_PREFIX, row.courseId, row.id].join(CONTEXT_SEPARATOR);
}

/** Display form of an attempt context: `course=<id>` inside a course, empty when standalone. */
export function normalizeContext(context: string): string {
	const [prefix, courseId] = context.split(CONTEXT_SEPARATOR);
	if (prefix !== CONTEXT_PREFIX || !courseId) {
		return "";
	}
	return `course=${courseId}`;
}

export default class EngagementService {
	constructor(private readonly verifications = new VerificationService()) {}

	async findActive(courseId: string, learnerId: string): Promise<EngagementRow | undefined> {
		const [row] = await db.select()
			.from(engagement)
			.where(and(
				eq(engagement.courseId, courseId),
				eq(engagement.learnerId, learnerId),
				eq(engagement.active, true),
			));
		return row;
	}

	async requireActive(courseId: string, learnerId: string): Promise<EngagementRow> {
		const row = await this.findActive(courseId, learnerId);
		if (!row) {
			throw new LearningError("NOT_FOUND", "No active engagement in this course");
		}
		return row;
	}

	/** Attempt context for a request: standalone unless a course is named. */
	async resolveContext(learnerId: string, courseId?: string): Promise<string> {
		if (!courseId) {
			return "";
		}
		return issueContext(await this.requireActive(courseId, learnerId));
	}

	async startEngagement(courseId: string, learnerId: string): Promise<EngagementRow> {
		const [target] = await db.select().from(course).where(eq(course.id, courseId));
		if (!target) {
			throw new LearningError("NOT_FOUND", "Course not found");
		}

		try {
			const started = await db.transaction(async (tx) => {
				if (target.verificationRequired && !(await this.verifications.consume(learnerId, courseId, tx))) {
					throw new LearningError("OTP_VERIFICATION_REQUIRED");
				}
				const [created] = await tx.insert(engagement).values({
					courseId,
					learnerId,
					active: true,
					createdAt: new Date(),
				}).returning();
				return created;
			});
			log.info("engagement started", { engagementId: started.id, courseId, learnerId });
			return started;
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new LearningError("ALREADY_EXISTS", "Already engaged in this course");
			}
			throw error;
		}
	}
}
