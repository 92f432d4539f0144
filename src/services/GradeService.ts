import { and, eq, inArray, isNotNull, sql } from "drizzle-orm";
import env from "../config/env";
import { db, type Executor } from "../db/client";
import {
	appeal,
	assessableItem,
	attempt,
	grade,
	question,
	submission,
	type AppealRow,
	type GradeRow,
	type QuestionRow,
} from "../db/schema";
import { LearningError } from "../helpers/LearningError";
import logger from "../helpers/Logger";
import type { EarnedDetails, ScoreStats } from "../types";
import DiscussionService from "./DiscussionService";
import { policyFor } from "./itemKinds";

const log = logger.child("grade");

export interface GradeOptions {
	// grader-supplied component values, merged over what the grade already holds
	overrides?: EarnedDetails;
	graderId?: string;
	executor?: Executor;
}

export interface ReviewInput {
	earnedDetails: EarnedDetails;
	feedback?: Record<string, string>;
	graderId: string;
}

export function sumEarned(details: EarnedDetails): number {
	return Object.values(details).reduce<number>((total, value) => total + (value ?? 0), 0);
}

export function scoreOf(earnedPoint: number, possiblePoint: number): number {
	return possiblePoint > 0 ? earnedPoint * 100 / possiblePoint : 0;
}

export default class GradeService {
	constructor(private readonly discussions = new DiscussionService()) {}

	/** Questions of an attempt, in the order they were composed. */
	async composedQuestions(questionIds: string[], executor: Executor = db): Promise<QuestionRow[]> {
		if (questionIds.length === 0) {
			return [];
		}
		const rows = await executor.select().from(question).where(inArray(question.id, questionIds));
		const byId = new Map(rows.map(row => [row.id, row]));
		return questionIds.flatMap(id => byId.get(id) ?? []);
	}

	/**
	 * Recomputes the grade of an attempt from its current submission or posts
	 * and upserts it. Completion and confirmation are left untouched.
	 */
	async grade(attemptId: string, options: GradeOptions = {}): Promise<GradeRow> {
		const executor = options.executor ?? db;
		const [row] = await executor.select({ attempt, item: assessableItem })
			.from(attempt)
			.innerJoin(assessableItem, eq(assessableItem.id, attempt.itemId))
			.where(eq(attempt.id, attemptId));
		if (!row) {
			throw new LearningError("NOT_FOUND", "Attempt not found");
		}

		const questions = await this.composedQuestions(row.attempt.questionIds, executor);
		if (questions.length === 0) {
			throw new LearningError("NO_QUESTION");
		}

		const [submitted] = await executor.select().from(submission).where(eq(submission.attemptId, attemptId));
		const [existing] = await executor.select().from(grade).where(eq(grade.attemptId, attemptId));
		const postCount = row.item.kind === "discussion"
			? await this.discussions.countPosts(row.attempt, questions[0], executor)
			: null;

		const { earnedDetails, possiblePoint } = policyFor(row.item.kind).scoreComponents({
			questions,
			submission: submitted ?? null,
			postCount,
			supplied: { ...existing?.earnedDetails, ...options.overrides },
		});
		const earnedPoint = sumEarned(earnedDetails);
		const score = scoreOf(earnedPoint, possiblePoint);
		const passed = score >= row.item.passingPoint;
		const now = new Date();

		const values = {
			earnedDetails,
			possiblePoint,
			earnedPoint,
			score,
			passed,
			updatedAt: now,
			...(options.graderId ? { graderId: options.graderId } : {}),
		};
		const [saved] = await executor.insert(grade)
			.values({ attemptId, createdAt: now, ...values })
			.onConflictDoUpdate({ target: grade.attemptId, set: values })
			.returning();
		return saved;
	}

	async findById(gradeId: string, executor: Executor = db): Promise<GradeRow> {
		const [row] = await executor.select().from(grade).where(eq(grade.id, gradeId));
		if (!row) {
			throw new LearningError("NOT_FOUND", "Grade not found");
		}
		return row;
	}

	/** Grader scoring pass: stores component values and feedback, then regrades. */
	async review(gradeId: string, input: ReviewInput): Promise<GradeRow> {
		return db.transaction(async (tx) => {
			const current = await this.findById(gradeId, tx);
			if (current.confirmedAt) {
				throw new LearningError("INVALID_STEP", "Grade is already confirmed");
			}
			const regraded = await this.grade(current.attemptId, {
				overrides: input.earnedDetails,
				graderId: input.graderId,
				executor: tx,
			});
			if (!input.feedback) {
				return regraded;
			}
			const [withFeedback] = await tx.update(grade)
				.set({ feedback: { ...regraded.feedback, ...input.feedback } })
				.where(eq(grade.id, gradeId))
				.returning();
			return withFeedback;
		});
	}

	async complete(gradeId: string, graderId: string): Promise<GradeRow> {
		const current = await this.findById(gradeId);
		if (current.completedAt) {
			return current;
		}
		const now = new Date();
		const [completed] = await db.update(grade)
			.set({ completedAt: now, graderId, updatedAt: now })
			.where(eq(grade.id, gradeId))
			.returning();
		log.info("grade completed", { gradeId, graderId });
		return completed;
	}

	async confirm(gradeId: string, graderId: string): Promise<GradeRow> {
		const current = await this.findById(gradeId);
		if (!current.completedAt) {
			throw new LearningError("CONFIRM_WITHOUT_COMPLETION");
		}
		if (current.confirmedAt) {
			return current;
		}
		const now = new Date();
		const [confirmed] = await db.update(grade)
			.set({ confirmedAt: now, graderId, updatedAt: now })
			.where(eq(grade.id, gradeId))
			.returning();
		log.info("grade confirmed", { gradeId, graderId });
		return confirmed;
	}

	async closeAppeal(appealId: string, review: string): Promise<AppealRow> {
		const [current] = await db.select().from(appeal).where(eq(appeal.id, appealId));
		if (!current) {
			throw new LearningError("NOT_FOUND", "Appeal not found");
		}
		if (current.closedAt) {
			throw new LearningError("INVALID_STEP", "Appeal is already closed");
		}
		const [closed] = await db.update(appeal)
			.set({ review, closedAt: new Date() })
			.where(eq(appeal.id, appealId))
			.returning();
		return closed;
	}

	/** Score summary over the completed grades of an item. */
	async getScoreStats(itemId: string): Promise<ScoreStats> {
		const completedOfItem = and(eq(attempt.itemId, itemId), isNotNull(grade.completedAt));
		const [summary] = await db.select({
			total: sql<number>`count(*)`.mapWith(Number),
			avgScore: sql<number>`coalesce(avg(${grade.score}), 0)`.mapWith(Number),
			minScore: sql<number>`coalesce(min(${grade.score}), 0)`.mapWith(Number),
			maxScore: sql<number>`coalesce(max(${grade.score}), 0)`.mapWith(Number),
		})
			.from(grade)
			.innerJoin(attempt, eq(attempt.id, grade.attemptId))
			.where(completedOfItem);

		const width = sql.raw(String(env.SCORE_BUCKET_SIZE));
		const bucket = sql<number>`floor(${grade.score} / ${width}) * ${width}`;
		const buckets = await db.select({
			bucket: bucket.mapWith(Number),
			count: sql<number>`count(*)`.mapWith(Number),
		})
			.from(grade)
			.innerJoin(attempt, eq(attempt.id, grade.attemptId))
			.where(completedOfItem)
			.groupBy(bucket)
			.orderBy(bucket);

		return {
			...summary,
			distribution: buckets.map((row): [number, number] => [row.bucket, row.count]),
		};
	}
}
