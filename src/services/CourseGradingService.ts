import { and, asc, eq, inArray, isNotNull } from "drizzle-orm";
import { db } from "../db/client";
import {
	assessableItem,
	assessment,
	attempt,
	certificateRequest,
	course,
	grade,
	gradebook,
	gradingPolicy,
	lesson,
	lessonMedia,
	mediaWatch,
	type EngagementRow,
	type GradebookRow,
} from "../db/schema";
import { isUniqueViolation, LearningError } from "../helpers/LearningError";
import logger from "../helpers/Logger";
import type { AccessWindow } from "../types";
import { applyCourseOffset } from "./AccessWindowService";
import EngagementService, { issueContext } from "./EngagementService";
import {
	COMPLETION_KEY,
	evaluateCriteria,
	normalizeWeights,
	type Criterion,
	type WeightedCriterion,
} from "./gradingCriteria";
import VerificationService from "./VerificationService";

const log = logger.child("course-grading");

const DEFAULT_POLICY = {
	assessmentWeight: 100,
	completionWeight: 0,
	completionPassingPoint: 80,
};

export interface LessonView {
	id: string;
	title: string;
	ordering: number;
	mediaIds: string[];
	startDate: Date;
	endDate: Date;
}

export interface CourseSession {
	course: typeof course.$inferSelect;
	accessWindow: AccessWindow;
	criteria: WeightedCriterion[];
	lessons: LessonView[];
	verificationRequired: boolean;
	engagement?: EngagementRow;
	context?: string;
	gradebook?: GradebookRow;
}

interface CriterionSources {
	completionRate: number;
	assessmentScores: ReadonlyMap<string, number>;
}

function criterionValue(criterion: Criterion, sources: CriterionSources): number | null {
	switch (criterion.kind) {
		case "completion":
			return sources.completionRate;
		case "assessment":
			return sources.assessmentScores.get(criterion.itemId) ?? null;
	}
}

export default class CourseGradingService {
	constructor(
		private readonly engagements = new EngagementService(),
		private readonly verifications = new VerificationService(),
	) {}

	async getPolicy(courseId: string) {
		const [policy] = await db.select().from(gradingPolicy).where(eq(gradingPolicy.courseId, courseId));
		return policy ?? { courseId, ...DEFAULT_POLICY };
	}

	/**
	 * Completion first, then assessments in schedule order. Dates are filled in
	 * when the course window is known.
	 */
	async buildCriteria(courseId: string, window?: AccessWindow): Promise<WeightedCriterion[]> {
		const policy = await this.getPolicy(courseId);
		const rows = await db.select({
			itemId: assessment.itemId,
			weight: assessment.weight,
			startOffsetDays: assessment.startOffsetDays,
			endOffsetDays: assessment.endOffsetDays,
			passingPoint: assessableItem.passingPoint,
			itemKind: assessableItem.kind,
			title: assessableItem.title,
		})
			.from(assessment)
			.innerJoin(assessableItem, eq(assessableItem.id, assessment.itemId))
			.where(eq(assessment.courseId, courseId))
			.orderBy(asc(assessment.startOffsetDays), asc(assessment.endOffsetDays), asc(assessment.itemId));

		const criteria: Criterion[] = [];
		if (policy.completionWeight !== 0 || policy.completionPassingPoint !== 0) {
			criteria.push({
				kind: "completion",
				key: COMPLETION_KEY,
				weight: policy.completionWeight,
				passingPoint: policy.completionPassingPoint,
				...(window ? { startDate: window.start, endDate: window.end } : {}),
			});
		}
		for (const row of rows) {
			if (row.weight === 0 && row.passingPoint === 0) continue;
			const dates = window ? applyCourseOffset(window, row) : undefined;
			criteria.push({
				kind: "assessment",
				key: row.itemId,
				itemId: row.itemId,
				itemKind: row.itemKind,
				title: row.title,
				weight: row.weight,
				passingPoint: row.passingPoint,
				...(dates ? { startDate: dates.start, endDate: dates.end } : {}),
			});
		}
		return normalizeWeights(policy, criteria);
	}

	/** Share of lessons whose every media was watched to a pass, 0–100. */
	async completionRate(courseId: string, learnerId: string, context: string): Promise<number> {
		const lessons = await db.select({ id: lesson.id }).from(lesson).where(eq(lesson.courseId, courseId));
		if (lessons.length === 0) {
			return 0;
		}

		const media = await db.select({ lessonId: lessonMedia.lessonId, mediaId: lessonMedia.mediaId })
			.from(lessonMedia)
			.innerJoin(lesson, eq(lesson.id, lessonMedia.lessonId))
			.where(eq(lesson.courseId, courseId));
		const watched = new Set(
			(await db.select({ mediaId: mediaWatch.mediaId })
				.from(mediaWatch)
				.where(and(
					eq(mediaWatch.userId, learnerId),
					eq(mediaWatch.context, context),
					eq(mediaWatch.passed, true),
				)))
				.map(row => row.mediaId),
		);

		const completed = lessons.filter(({ id }) => {
			const own = media.filter(row => row.lessonId === id);
			return own.length > 0 && own.every(row => watched.has(row.mediaId));
		});
		return completed.length * 100 / lessons.length;
	}

	/** Scores of confirmed grades on the active attempts of a course run. */
	private async assessmentScores(learnerId: string, context: string, itemIds: string[]): Promise<Map<string, number>> {
		if (itemIds.length === 0) {
			return new Map();
		}
		const rows = await db.select({ itemId: attempt.itemId, score: grade.score })
			.from(grade)
			.innerJoin(attempt, eq(attempt.id, grade.attemptId))
			.where(and(
				eq(attempt.learnerId, learnerId),
				eq(attempt.context, context),
				eq(attempt.active, true),
				inArray(attempt.itemId, itemIds),
				isNotNull(grade.completedAt),
				isNotNull(grade.confirmedAt),
			));
		return new Map(rows.map(row => [row.itemId, row.score]));
	}

	async gradeCourse(courseId: string, learnerId: string, graderId?: string): Promise<{ gradebook: GradebookRow; criteria: WeightedCriterion[] }> {
		const engaged = await this.engagements.requireActive(courseId, learnerId);
		const context = issueContext(engaged);
		const criteria = await this.buildCriteria(courseId);

		const completionRate = await this.completionRate(courseId, learnerId, context);
		const assessmentScores = await this.assessmentScores(
			learnerId,
			context,
			criteria.flatMap(criterion => criterion.kind === "assessment" ? [criterion.itemId] : []),
		);
		const sources: CriterionSources = { completionRate, assessmentScores };
		const { details, score, passed } = evaluateCriteria(
			criteria,
			new Map(criteria.map(criterion => [criterion.key, criterionValue(criterion, sources)])),
		);

		const now = new Date();
		const values = {
			details,
			score,
			completionRate,
			passed,
			updatedAt: now,
			graderId: graderId ?? null,
		};
		const [saved] = await db.insert(gradebook)
			.values({ engagementId: engaged.id, ...values })
			.onConflictDoUpdate({ target: gradebook.engagementId, set: values })
			.returning();
		log.info("course graded", { engagementId: engaged.id, score, passed });
		return { gradebook: saved, criteria };
	}

	async confirmGradebook(gradebookId: string, graderId: string): Promise<GradebookRow> {
		const [current] = await db.select().from(gradebook).where(eq(gradebook.id, gradebookId));
		if (!current) {
			throw new LearningError("NOT_FOUND", "Gradebook not found");
		}
		if (current.confirmedAt) {
			return current;
		}
		const now = new Date();
		const [confirmed] = await db.update(gradebook)
			.set({ confirmedAt: now, graderId, updatedAt: now })
			.where(eq(gradebook.id, gradebookId))
			.returning();
		return confirmed;
	}

	async requestCertificate(courseId: string, learnerId: string) {
		const engaged = await this.engagements.requireActive(courseId, learnerId);
		const [book] = await db.select().from(gradebook).where(eq(gradebook.engagementId, engaged.id));
		if (!book?.confirmedAt || !book.passed) {
			throw new LearningError("NOT_QUALIFIED_FOR_CERTIFICATE");
		}

		try {
			const [request] = await db.insert(certificateRequest).values({
				engagementId: engaged.id,
				score: book.score,
				passed: book.passed,
				requestedAt: new Date(),
			}).returning();
			log.info("certificate requested", { engagementId: engaged.id });
			return request;
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new LearningError("ALREADY_EXISTS", "Certificate already requested");
			}
			throw error;
		}
	}

	async getCourseSession(courseId: string, learnerId: string, window: AccessWindow): Promise<CourseSession> {
		const [target] = await db.select().from(course).where(eq(course.id, courseId));
		if (!target) {
			throw new LearningError("NOT_FOUND", "Course not found");
		}

		const criteria = await this.buildCriteria(courseId, window);
		const lessonRows = await db.select().from(lesson).where(eq(lesson.courseId, courseId)).orderBy(asc(lesson.ordering));
		const media = await db.select({ lessonId: lessonMedia.lessonId, mediaId: lessonMedia.mediaId })
			.from(lessonMedia)
			.innerJoin(lesson, eq(lesson.id, lessonMedia.lessonId))
			.where(eq(lesson.courseId, courseId));
		const lessons = lessonRows.map((row): LessonView => {
			const dates = applyCourseOffset(window, row);
			return {
				id: row.id,
				title: row.title,
				ordering: row.ordering,
				mediaIds: media.filter(entry => entry.lessonId === row.id).map(entry => entry.mediaId),
				startDate: dates.start,
				endDate: dates.end,
			};
		});

		const session: CourseSession = {
			course: target,
			accessWindow: window,
			criteria,
			lessons,
			verificationRequired: false,
		};
		const engaged = await this.engagements.findActive(courseId, learnerId);
		if (!engaged) {
			session.verificationRequired = target.verificationRequired
				&& !(await this.verifications.isVerified(learnerId, courseId));
			return session;
		}
		session.engagement = engaged;
		session.context = issueContext(engaged);
		const [book] = await db.select().from(gradebook).where(eq(gradebook.engagementId, engaged.id));
		session.gradebook = book;
		return session;
	}
}
