import { and, count, desc, eq, sql } from "drizzle-orm";
import env from "../config/env";
import { db } from "../db/client";
import {
	appeal,
	assessableItem,
	attempt,
	grade,
	question,
	questionPool,
	scratchAnswer,
	submission,
	type AppealRow,
	type AssessableItemRow,
	type AttemptRow,
	type DiscussionPostRow,
	type GradeRow,
	type QuestionRow,
	type SubmissionRow,
} from "../db/schema";
import { isUniqueViolation, LearningError } from "../helpers/LearningError";
import logger from "../helpers/Logger";
import {
	SessionStep,
	type AccessWindow,
	type AnswerMap,
	type GradingDates,
	type ItemKind,
	type PostCount,
	type ScoreStats,
} from "../types";
import { gradingDates } from "./AccessWindowService";
import DiscussionService, { type PostInput } from "./DiscussionService";
import GradeService from "./GradeService";
import { policyFor, type ItemKindPolicy, type SubmitInput } from "./itemKinds";
import VerificationService from "./VerificationService";

const log = logger.child("attempt");

/** Identifies the learner's slot on an item: one active attempt per ref. */
export interface AttemptRef {
	kind: ItemKind;
	itemId: string;
	learnerId: string;
	context: string;
}

export interface QuestionView {
	id: string;
	format: string;
	prompt: string;
	options: string[];
	point: number;
	rubric: QuestionRow["rubric"];
	attachmentFileCount: number;
	pointRequirements: QuestionRow["pointRequirements"];
	correctAnswers?: string[];
}

export interface SessionView {
	step: SessionStep;
	accessWindow: AccessWindow;
	gradingDates: GradingDates;
	item: AssessableItemRow;
	verificationRequired: boolean;
	attempt?: AttemptRow;
	deadline?: Date | null;
	questions?: QuestionView[];
	savedAnswers?: AnswerMap;
	submission?: SubmissionRow;
	grade?: GradeRow;
	appeal?: AppealRow;
	postCount?: PostCount;
	stats?: ScoreStats;
}

export interface StepInput {
	policy: Pick<ItemKindPolicy, "acceptsSubmission">;
	attempt?: AttemptRow;
	deadline: Date | null;
	hasSubmission: boolean;
	grade?: Pick<GradeRow, "completedAt" | "confirmedAt">;
	now: Date;
}

/** The learner-facing step is always derived from the stored rows, never stored itself. */
export function deriveStep(input: StepInput): SessionStep {
	if (!input.attempt) {
		return SessionStep.READY;
	}
	if (input.policy.acceptsSubmission && !input.hasSubmission) {
		return input.deadline && input.now >= input.deadline ? SessionStep.TIMEOUT : SessionStep.SITTING;
	}
	if (!input.grade?.completedAt) {
		// discussions have no submission and keep writing until a grader completes them
		return input.policy.acceptsSubmission ? SessionStep.GRADING : SessionStep.SITTING;
	}
	return input.grade.confirmedAt ? SessionStep.FINAL : SessionStep.REVIEWING;
}

export function attemptDeadline(
	policy: Pick<ItemKindPolicy, "hasDeadline">,
	item: Pick<AssessableItemRow, "durationSeconds">,
	started: AttemptRow,
): Date | null {
	if (!policy.hasDeadline || item.durationSeconds === null) {
		return null;
	}
	return new Date(started.startedAt.getTime() + item.durationSeconds * 1000);
}

export function toQuestionView(row: QuestionRow, withSolutions: boolean): QuestionView {
	return {
		id: row.id,
		format: row.format,
		prompt: row.prompt,
		options: row.options,
		point: row.point,
		rubric: row.rubric,
		attachmentFileCount: row.attachmentFileCount,
		pointRequirements: row.pointRequirements,
		...(withSolutions ? { correctAnswers: row.correctAnswers } : {}),
	};
}

export default class AttemptService {
	constructor(
		private readonly grades = new GradeService(),
		private readonly verifications = new VerificationService(),
		private readonly discussions = new DiscussionService(),
	) {}

	async getItem(ref: Pick<AttemptRef, "kind" | "itemId">): Promise<AssessableItemRow> {
		const [item] = await db.select()
			.from(assessableItem)
			.where(and(eq(assessableItem.id, ref.itemId), eq(assessableItem.kind, ref.kind)));
		if (!item) {
			throw new LearningError("NOT_FOUND", `No ${ref.kind} ${ref.itemId}`);
		}
		return item;
	}

	async findActive(ref: AttemptRef): Promise<AttemptRow | undefined> {
		const [row] = await db.select()
			.from(attempt)
			.where(and(
				eq(attempt.itemId, ref.itemId),
				eq(attempt.learnerId, ref.learnerId),
				eq(attempt.context, ref.context),
				eq(attempt.active, true),
			))
			.orderBy(desc(attempt.startedAt))
			.limit(1);
		return row;
	}

	private async requireActive(ref: AttemptRef): Promise<AttemptRow> {
		const active = await this.findActive(ref);
		if (!active) {
			throw new LearningError("NOT_FOUND", "No active attempt");
		}
		return active;
	}

	private async countAttempts(ref: AttemptRef): Promise<number> {
		const [row] = await db.select({ total: count() })
			.from(attempt)
			.where(and(
				eq(attempt.itemId, ref.itemId),
				eq(attempt.learnerId, ref.learnerId),
				eq(attempt.context, ref.context),
			));
		return row?.total ?? 0;
	}

	private assertBeforeDeadline(deadline: Date | null) {
		if (!deadline) return;
		const cutoff = deadline.getTime() + env.SUBMISSION_GRACE_SECONDS * 1000;
		if (Date.now() > cutoff) {
			throw new LearningError("ATTEMPT_HAS_EXPIRED");
		}
	}

	async getSession(ref: AttemptRef, window: AccessWindow): Promise<SessionView> {
		const item = await this.getItem(ref);
		const policy = policyFor(item.kind);
		const base = {
			accessWindow: window,
			gradingDates: gradingDates(item, window),
			item,
		};

		const active = await this.findActive(ref);
		if (!active) {
			const verificationRequired = item.verificationRequired
				&& !(await this.verifications.isVerified(ref.learnerId, item.id));
			return { ...base, step: SessionStep.READY, verificationRequired };
		}

		const [submitted] = await db.select().from(submission).where(eq(submission.attemptId, active.id));
		const [graded] = await db.select().from(grade).where(eq(grade.attemptId, active.id));
		const deadline = attemptDeadline(policy, item, active);
		const step = deriveStep({
			policy,
			attempt: active,
			deadline,
			hasSubmission: submitted !== undefined,
			grade: graded,
			now: new Date(),
		});

		const reviewed = step === SessionStep.REVIEWING || step === SessionStep.FINAL;
		const questions = await this.grades.composedQuestions(active.questionIds);
		const view: SessionView = {
			...base,
			step,
			verificationRequired: false,
			attempt: active,
			deadline,
			questions: questions.map(row => toQuestionView(row, reviewed)),
			submission: submitted,
			grade: graded,
		};

		if (step === SessionStep.SITTING && policy.hasDeadline) {
			const [saved] = await db.select().from(scratchAnswer).where(eq(scratchAnswer.attemptId, active.id));
			view.savedAnswers = saved?.answers ?? {};
		}
		if (item.kind === "discussion" && questions.length > 0) {
			view.postCount = await this.discussions.countPosts(active, questions[0]);
		}
		if (reviewed) {
			const [filed] = await db.select()
				.from(appeal)
				.where(and(eq(appeal.itemId, item.id), eq(appeal.learnerId, ref.learnerId)));
			view.appeal = filed;
		}
		if (step === SessionStep.FINAL) {
			view.stats = await this.grades.getScoreStats(item.id);
		}
		return view;
	}

	async startAttempt(ref: AttemptRef): Promise<{ attempt: AttemptRow; questions: QuestionView[] }> {
		const item = await this.getItem(ref);
		const policy = policyFor(item.kind);

		if (item.maxAttempts > 0 && await this.countAttempts(ref) >= item.maxAttempts) {
			throw new LearningError("MAX_ATTEMPTS_REACHED");
		}

		const [pool] = await db.select().from(questionPool).where(eq(questionPool.id, item.questionPoolId));
		if (!pool) {
			throw new LearningError("QUESTION_POOL_EMPTY");
		}
		const candidates = await db.select().from(question).where(eq(question.poolId, pool.id));
		const questionIds = policy.selectContent(pool, candidates);

		try {
			const started = await db.transaction(async (tx) => {
				if (item.verificationRequired && !(await this.verifications.consume(ref.learnerId, item.id, tx))) {
					throw new LearningError("OTP_VERIFICATION_REQUIRED");
				}
				const [created] = await tx.insert(attempt).values({
					itemId: item.id,
					learnerId: ref.learnerId,
					context: ref.context,
					questionIds,
					startedAt: new Date(),
					active: true,
				}).returning();
				if (policy.gradesOnStart) {
					await this.grades.grade(created.id, { executor: tx });
				}
				return created;
			});
			log.info("attempt started", { attemptId: started.id, itemId: item.id, learnerId: ref.learnerId });

			const byId = new Map(candidates.map(row => [row.id, row]));
			return {
				attempt: started,
				questions: questionIds.flatMap(id => byId.get(id) ?? []).map(row => toQuestionView(row, false)),
			};
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new LearningError("ATTEMPT_ALREADY_STARTED");
			}
			throw error;
		}
	}

	/** Merges partial answers into the scratch record of a running time-boxed attempt. */
	async saveProgress(ref: AttemptRef, answers: AnswerMap): Promise<AnswerMap> {
		const item = await this.getItem(ref);
		const policy = policyFor(item.kind);
		if (!policy.hasDeadline) {
			throw new LearningError("SUBMISSION_NOT_ACCEPTED", "Only time-boxed items keep scratch answers");
		}
		if (Object.keys(answers).length === 0) {
			throw new LearningError("NO_ANSWERS");
		}

		const active = await this.requireActive(ref);
		const [submitted] = await db.select({ id: submission.id }).from(submission).where(eq(submission.attemptId, active.id));
		if (submitted) {
			throw new LearningError("ATTEMPT_ALREADY_SUBMITTED");
		}
		this.assertBeforeDeadline(attemptDeadline(policy, item, active));

		const now = new Date();
		const [saved] = await db.insert(scratchAnswer)
			.values({ attemptId: active.id, answers, updatedAt: now })
			.onConflictDoUpdate({
				target: scratchAnswer.attemptId,
				set: {
					answers: sql`${scratchAnswer.answers} || excluded.answers`,
					updatedAt: now,
				},
			})
			.returning();
		return saved.answers;
	}

	async submit(ref: AttemptRef, input: SubmitInput): Promise<{ submission: SubmissionRow; grade: GradeRow }> {
		const item = await this.getItem(ref);
		const policy = policyFor(item.kind);
		if (!policy.acceptsSubmission) {
			throw new LearningError("SUBMISSION_NOT_ACCEPTED");
		}

		const active = await this.requireActive(ref);
		const deadline = attemptDeadline(policy, item, active);
		this.assertBeforeDeadline(deadline);
		const questions = await this.grades.composedQuestions(active.questionIds);
		const draft = policy.validateSubmission(input, questions);

		try {
			const result = await db.transaction(async (tx) => {
				// the deadline is checked again right before the row is written
				this.assertBeforeDeadline(deadline);
				const [created] = await tx.insert(submission).values({
					attemptId: active.id,
					...draft,
					createdAt: new Date(),
				}).returning();
				const preliminary = await this.grades.grade(active.id, { executor: tx });
				return { submission: created, grade: preliminary };
			});
			log.info("attempt submitted", { attemptId: active.id, score: result.grade.score });
			return result;
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new LearningError("ATTEMPT_ALREADY_SUBMITTED");
			}
			throw error;
		}
	}

	async deactivate(ref: AttemptRef): Promise<AttemptRow> {
		const item = await this.getItem(ref);
		const active = await this.requireActive(ref);

		if (item.maxAttempts > 0 && item.maxAttempts <= await this.countAttempts(ref)) {
			throw new LearningError("MAX_ATTEMPTS_REACHED");
		}

		const [deactivated] = await db.update(attempt)
			.set({ active: false })
			.where(and(eq(attempt.id, active.id), eq(attempt.active, true)))
			.returning();
		if (!deactivated) {
			throw new LearningError("NOT_FOUND", "No active attempt");
		}
		log.info("attempt deactivated", { attemptId: active.id });
		return deactivated;
	}

	async createPost(ref: AttemptRef, input: PostInput): Promise<{ post: DiscussionPostRow; grade: GradeRow }> {
		const item = await this.getItem(ref);
		if (item.kind !== "discussion") {
			throw new LearningError("SUBMISSION_NOT_ACCEPTED");
		}
		const active = await this.requireActive(ref);
		const [graded] = await db.select({ completedAt: grade.completedAt }).from(grade).where(eq(grade.attemptId, active.id));
		if (graded?.completedAt) {
			throw new LearningError("INVALID_STEP", "Discussion is already graded");
		}

		return db.transaction(async (tx) => {
			const post = await this.discussions.createPost(active, input, tx);
			const regraded = await this.grades.grade(active.id, { executor: tx });
			return { post, grade: regraded };
		});
	}

	/** An appeal against one question, while the grade is under review. */
	async createAppeal(ref: AttemptRef, input: { questionId: string; explanation: string }): Promise<AppealRow> {
		await this.getItem(ref);
		const active = await this.requireActive(ref);
		const [graded] = await db.select().from(grade).where(eq(grade.attemptId, active.id));
		if (!graded?.completedAt || graded.confirmedAt) {
			throw new LearningError("INVALID_STEP", "Appeals are accepted while the grade is under review");
		}
		if (!active.questionIds.includes(input.questionId)) {
			throw new LearningError("NOT_FOUND", "Question is not part of this attempt");
		}

		try {
			const [filed] = await db.insert(appeal).values({
				itemId: ref.itemId,
				learnerId: ref.learnerId,
				questionId: input.questionId,
				explanation: input.explanation,
				createdAt: new Date(),
			}).returning();
			return filed;
		} catch (error) {
			if (isUniqueViolation(error)) {
				throw new LearningError("ALREADY_EXISTS", "An appeal was already filed");
			}
			throw error;
		}
	}
}
