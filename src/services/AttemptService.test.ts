import { and, eq } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { db } from "../db/client";
import { attempt, grade, verification } from "../db/schema";
import { resetTestDatabase } from "../db/testDatabase";
import {
	GRADER_ID,
	LEARNER_ID,
	OTHER_LEARNER_ID,
	seedExam,
	seedItem,
	seedPool,
	seedQuestion,
	seedVerification,
} from "../db/testFixtures";
import { SessionStep, type ItemKind } from "../types";
import AttemptService, { deriveStep, type AttemptRef } from "./AttemptService";
import GradeService from "./GradeService";
import { policyFor } from "./itemKinds";

vi.mock("../db/client", async () => {
	const { createTestDatabase } = await import("../db/testDatabase");
	return { db: await createTestDatabase() };
});

const window = {
	start: new Date("2024-01-01T00:00:00Z"),
	end: new Date("2024-02-01T00:00:00Z"),
	archive: new Date("2024-03-01T00:00:00Z"),
};

function refOf(itemId: string, kind: ItemKind = "exam", learnerId = LEARNER_ID): AttemptRef {
	return { kind, itemId, learnerId, context: "" };
}

describe("deriveStep", () => {
	const exam = policyFor("exam");
	const discussion = policyFor("discussion");
	const started = {
		id: "attempt",
		itemId: "item",
		learnerId: LEARNER_ID,
		context: "",
		questionIds: [],
		startedAt: new Date("2024-01-15T00:00:00Z"),
		active: true,
	};
	const deadline = new Date("2024-01-15T00:10:00Z");
	const now = new Date("2024-01-15T00:05:00Z");

	it("walks an exam through its steps", () => {
		expect(deriveStep({ policy: exam, deadline: null, hasSubmission: false, now })).toBe(SessionStep.READY);
		expect(deriveStep({ policy: exam, attempt: started, deadline, hasSubmission: false, now })).toBe(SessionStep.SITTING);
		expect(deriveStep({ policy: exam, attempt: started, deadline, hasSubmission: true, now })).toBe(SessionStep.GRADING);
		expect(deriveStep({
			policy: exam,
			attempt: started,
			deadline,
			hasSubmission: true,
			grade: { completedAt: now, confirmedAt: null },
			now,
		})).toBe(SessionStep.REVIEWING);
		expect(deriveStep({
			policy: exam,
			attempt: started,
			deadline,
			hasSubmission: true,
			grade: { completedAt: now, confirmedAt: now },
			now,
		})).toBe(SessionStep.FINAL);
	});

	it("times out an unsubmitted attempt after its deadline", () => {
		const late = new Date("2024-01-15T00:10:01Z");

		expect(deriveStep({ policy: exam, attempt: started, deadline, hasSubmission: false, now: late })).toBe(SessionStep.TIMEOUT);
	});

	it("times out exactly at the deadline", () => {
		const justBefore = new Date("2024-01-15T00:09:59Z");

		expect(deriveStep({ policy: exam, attempt: started, deadline, hasSubmission: false, now: justBefore })).toBe(SessionStep.SITTING);
		expect(deriveStep({ policy: exam, attempt: started, deadline, hasSubmission: false, now: deadline })).toBe(SessionStep.TIMEOUT);
	});

	it("never reports review before the grade is completed", () => {
		const step = deriveStep({
			policy: exam,
			attempt: started,
			deadline,
			hasSubmission: true,
			grade: { completedAt: null, confirmedAt: null },
			now,
		});

		expect(step).toBe(SessionStep.GRADING);
	});

	it("keeps a discussion sitting until it is completed", () => {
		const preliminary = { completedAt: null, confirmedAt: null };

		expect(deriveStep({ policy: discussion, attempt: started, deadline: null, hasSubmission: false, grade: preliminary, now }))
			.toBe(SessionStep.SITTING);
		expect(deriveStep({
			policy: discussion,
			attempt: started,
			deadline: null,
			hasSubmission: false,
			grade: { completedAt: now, confirmedAt: null },
			now,
		})).toBe(SessionStep.REVIEWING);
	});
});

describe("AttemptService", () => {
	const service = new AttemptService();
	const grades = new GradeService();

	beforeEach(async () => {
		await resetTestDatabase(db);
		vi.useFakeTimers({ toFake: ["Date"] });
		vi.setSystemTime(new Date("2024-01-15T00:00:00Z"));
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	describe("exam lifecycle", () => {
		it("moves from ready to grading through start and submit", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);

			expect((await service.getSession(ref, window)).step).toBe(SessionStep.READY);

			const started = await service.startAttempt(ref);
			expect(started.attempt.questionIds).toEqual([question.id]);
			expect(started.questions).toEqual([expect.objectContaining({ id: question.id, format: "number_input" })]);
			expect(started.questions[0].correctAnswers).toBeUndefined();

			const sitting = await service.getSession(ref, window);
			expect(sitting.step).toBe(SessionStep.SITTING);
			expect(sitting.savedAnswers).toEqual({});
			expect(sitting.deadline).toEqual(new Date("2024-01-15T00:10:00Z"));

			await service.submit(ref, { answers: { [question.id]: "3" } });
			const grading = await service.getSession(ref, window);
			expect(grading.step).toBe(SessionStep.GRADING);
			expect(grading.questions?.[0].correctAnswers).toBeUndefined();
		});

		it("grades a numerically equal answer as correct", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);

			const { grade: preliminary } = await service.submit(ref, { answers: { [question.id]: "3" } });

			expect(preliminary.earnedDetails).toEqual({ [question.id]: 1 });
			expect(preliminary.score).toBe(100);
			expect(preliminary.passed).toBe(true);
		});

		it("rejects a second submission", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);
			await service.submit(ref, { answers: { [question.id]: "3" } });

			await expect(service.submit(ref, { answers: { [question.id]: "4" } }))
				.rejects.toMatchObject({ code: "ATTEMPT_ALREADY_SUBMITTED" });
		});

		it("refuses to submit without an active attempt", async () => {
			const { item, question } = await seedExam(db);

			await expect(service.submit(refOf(item.id), { answers: { [question.id]: "3" } }))
				.rejects.toMatchObject({ code: "NOT_FOUND" });
		});

		it("accepts a submission inside the grace period", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);
			vi.setSystemTime(new Date("2024-01-15T00:10:03Z"));

			expect((await service.getSession(ref, window)).step).toBe(SessionStep.TIMEOUT);
			await expect(service.submit(ref, { answers: { [question.id]: "3" } })).resolves.toBeDefined();
		});

		it("expires the attempt after deadline and grace", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);
			vi.setSystemTime(new Date("2024-01-15T00:10:06Z"));

			await expect(service.submit(ref, { answers: { [question.id]: "3" } }))
				.rejects.toMatchObject({ code: "ATTEMPT_HAS_EXPIRED" });
			await expect(service.saveProgress(ref, { [question.id]: "3" }))
				.rejects.toMatchObject({ code: "ATTEMPT_HAS_EXPIRED" });
		});

		it("merges saved progress without submitting", async () => {
			const { item } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);

			await service.saveProgress(ref, { a: "1" });
			await service.saveProgress(ref, { b: "2" });
			const merged = await service.saveProgress(ref, { a: "3" });

			expect(merged).toEqual({ a: "3", b: "2" });
			const session = await service.getSession(ref, window);
			expect(session.step).toBe(SessionStep.SITTING);
			expect(session.savedAnswers).toEqual({ a: "3", b: "2" });
			expect(session.submission).toBeUndefined();
		});

		it("rejects empty progress", async () => {
			const { item } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);

			await expect(service.saveProgress(ref, {})).rejects.toMatchObject({ code: "NO_ANSWERS" });
		});

		it("does not find an item under another kind", async () => {
			const { item } = await seedExam(db);

			await expect(service.startAttempt(refOf(item.id, "assignment"))).rejects.toMatchObject({ code: "NOT_FOUND" });
		});
	});

	describe("one active attempt", () => {
		it("lets exactly one of two concurrent starts win", async () => {
			const { item } = await seedExam(db);
			const ref = refOf(item.id);

			const results = await Promise.allSettled([service.startAttempt(ref), service.startAttempt(ref)]);

			expect(results.filter(result => result.status === "fulfilled")).toHaveLength(1);
			const rejected = results.filter(result => result.status === "rejected");
			expect(rejected).toHaveLength(1);
			expect(rejected[0]).toMatchObject({ reason: { code: "ATTEMPT_ALREADY_STARTED" } });

			const active = await db.select().from(attempt).where(and(eq(attempt.itemId, item.id), eq(attempt.active, true)));
			expect(active).toHaveLength(1);
		});

		it("rejects a second start while one is active", async () => {
			const { item } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);

			await expect(service.startAttempt(ref)).rejects.toMatchObject({ code: "ATTEMPT_ALREADY_STARTED" });
		});

		it("keeps standalone and course attempts apart", async () => {
			const { item } = await seedExam(db);
			await service.startAttempt(refOf(item.id));

			await expect(service.startAttempt({ ...refOf(item.id), context: "course::c::e" })).resolves.toBeDefined();
		});
	});

	describe("max attempts", () => {
		it("stops a learner with a single allowed attempt from retrying", async () => {
			const { item, question } = await seedExam(db, { maxAttempts: 1 });
			const ref = refOf(item.id);
			await service.startAttempt(ref);
			await service.submit(ref, { answers: { [question.id]: "1" } });

			await expect(service.deactivate(ref)).rejects.toMatchObject({ code: "MAX_ATTEMPTS_REACHED" });
			await expect(service.startAttempt(ref)).rejects.toMatchObject({ code: "MAX_ATTEMPTS_REACHED" });
		});

		it("allows retries until the limit is met", async () => {
			const { item } = await seedExam(db, { maxAttempts: 2 });
			const ref = refOf(item.id);
			await service.startAttempt(ref);

			const deactivated = await service.deactivate(ref);
			expect(deactivated.active).toBe(false);
			expect((await service.getSession(ref, window)).step).toBe(SessionStep.READY);

			await service.startAttempt(ref);
			await expect(service.deactivate(ref)).rejects.toMatchObject({ code: "MAX_ATTEMPTS_REACHED" });
		});

		it("deactivates freely when attempts are unlimited", async () => {
			const { item } = await seedExam(db);
			const ref = refOf(item.id);
			for (let round = 0; round < 3; round++) {
				await service.startAttempt(ref);
				await service.deactivate(ref);
			}

			const rows = await db.select().from(attempt).where(eq(attempt.itemId, item.id));
			expect(rows).toHaveLength(3);
			expect(rows.every(row => !row.active)).toBe(true);
		});

		it("fails to deactivate without an active attempt", async () => {
			const { item } = await seedExam(db);

			await expect(service.deactivate(refOf(item.id))).rejects.toMatchObject({ code: "NOT_FOUND" });
		});
	});

	describe("verification", () => {
		it("requires a fresh verification to start", async () => {
			const { item } = await seedExam(db, { verificationRequired: true });
			const ref = refOf(item.id);

			const ready = await service.getSession(ref, window);
			expect(ready.verificationRequired).toBe(true);
			await expect(service.startAttempt(ref)).rejects.toMatchObject({ code: "OTP_VERIFICATION_REQUIRED" });
		});

		it("consumes the verification on start", async () => {
			const { item } = await seedExam(db, { verificationRequired: true });
			const ref = refOf(item.id);
			const record = await seedVerification(db, LEARNER_ID, item.id);

			expect((await service.getSession(ref, window)).verificationRequired).toBe(false);
			await service.startAttempt(ref);
			await service.deactivate(ref);

			const [used] = await db.select().from(verification).where(eq(verification.id, record.id));
			expect(used.consumedAt).toEqual(new Date("2024-01-15T00:00:00Z"));
			await expect(service.startAttempt(ref)).rejects.toMatchObject({ code: "OTP_VERIFICATION_REQUIRED" });
		});

		it("ignores a verification older than five minutes", async () => {
			const { item } = await seedExam(db, { verificationRequired: true });
			await seedVerification(db, LEARNER_ID, item.id, new Date("2024-01-14T23:54:59Z"));

			await expect(service.startAttempt(refOf(item.id))).rejects.toMatchObject({ code: "OTP_VERIFICATION_REQUIRED" });
		});

		it("keeps the verification when the start conflicts", async () => {
			const { item } = await seedExam(db, { verificationRequired: true });
			const ref = refOf(item.id);
			await seedVerification(db, LEARNER_ID, item.id);
			await service.startAttempt(ref);
			const spare = await seedVerification(db, LEARNER_ID, item.id);

			await expect(service.startAttempt(ref)).rejects.toMatchObject({ code: "ATTEMPT_ALREADY_STARTED" });
			const [unused] = await db.select().from(verification).where(eq(verification.id, spare.id));
			expect(unused.consumedAt).toBeNull();
		});
	});

	describe("review", () => {
		it("shows solutions and stats only once grading moves on", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);
			const { grade: preliminary } = await service.submit(ref, { answers: { [question.id]: "3" } });

			await grades.complete(preliminary.id, GRADER_ID);
			const reviewing = await service.getSession(ref, window);
			expect(reviewing.step).toBe(SessionStep.REVIEWING);
			expect(reviewing.questions?.[0].correctAnswers).toEqual(["3.0"]);
			expect(reviewing.stats).toBeUndefined();

			await grades.confirm(preliminary.id, GRADER_ID);
			const final = await service.getSession(ref, window);
			expect(final.step).toBe(SessionStep.FINAL);
			expect(final.stats).toEqual({
				total: 1,
				avgScore: 100,
				minScore: 100,
				maxScore: 100,
				distribution: [[100, 1]],
			});
		});

		it("files one appeal while the grade is under review", async () => {
			const { item, question } = await seedExam(db);
			const ref = refOf(item.id);
			await service.startAttempt(ref);
			const { grade: preliminary } = await service.submit(ref, { answers: { [question.id]: "2" } });
			const appealInput = { questionId: question.id, explanation: "2 should count" };

			await expect(service.createAppeal(ref, appealInput)).rejects.toMatchObject({ code: "INVALID_STEP" });

			await grades.complete(preliminary.id, GRADER_ID);
			const filed = await service.createAppeal(ref, appealInput);
			expect(filed).toMatchObject({ itemId: item.id, learnerId: LEARNER_ID, closedAt: null });
			await expect(service.createAppeal(ref, appealInput)).rejects.toMatchObject({ code: "ALREADY_EXISTS" });

			const session = await service.getSession(ref, window);
			expect(session.appeal?.id).toBe(filed.id);
		});
	});

	describe("assignment", () => {
		it("stores the submission and waits for the rubric", async () => {
			const pool = await seedPool(db);
			const question = await seedQuestion(db, {
				poolId: pool.id,
				format: "assignment",
				attachmentFileCount: 1,
				rubric: [{ name: "clarity", maxPoint: 4 }, { name: "depth", maxPoint: 6 }],
			});
			const item = await seedItem(db, { kind: "assignment", questionPoolId: pool.id });
			const ref = refOf(item.id, "assignment");

			const started = await service.startAttempt(ref);
			expect(started.attempt.questionIds).toEqual([question.id]);
			await expect(service.saveProgress(ref, { a: "1" })).rejects.toMatchObject({ code: "SUBMISSION_NOT_ACCEPTED" });

			const result = await service.submit(ref, {
				answer: "<p>My essay</p>",
				attachments: [{ name: "essay.pdf", size: 1024 }],
			});

			expect(result.submission.extractedText).toBe("My essay");
			expect(result.grade).toMatchObject({
				earnedDetails: { clarity: null, depth: null },
				possiblePoint: 10,
				earnedPoint: 0,
				score: 0,
				passed: false,
			});
			expect((await service.getSession(ref, window)).step).toBe(SessionStep.GRADING);
		});

		it("fails on an empty pool", async () => {
			const pool = await seedPool(db);
			const item = await seedItem(db, { kind: "assignment", questionPoolId: pool.id });

			await expect(service.startAttempt(refOf(item.id, "assignment"))).rejects.toMatchObject({ code: "QUESTION_POOL_EMPTY" });
		});
	});

	describe("discussion", () => {
		async function seedDiscussion() {
			const pool = await seedPool(db);
			await seedQuestion(db, {
				poolId: pool.id,
				format: "discussion",
				pointRequirements: { post: 1, reply: 1, tutorAssessment: 1, postMinCharacters: 10, replyMinCharacters: 5 },
			});
			return seedItem(db, { kind: "discussion", questionPoolId: pool.id, passingPoint: 60 });
		}

		it("grades on start and regrades after each post", async () => {
			const item = await seedDiscussion();
			const ref = refOf(item.id, "discussion");

			await service.startAttempt(ref);
			const [preliminary] = await db.select().from(grade);
			expect(preliminary).toMatchObject({
				earnedDetails: { post: 0, reply: 0, tutorAssessment: null },
				possiblePoint: 3,
				earnedPoint: 0,
			});

			const { grade: regraded } = await service.createPost(ref, { title: "Intro", body: "Long enough post" });
			expect(regraded.earnedDetails).toEqual({ post: 1, reply: 0, tutorAssessment: null });
			expect(regraded.earnedPoint).toBe(1);

			const session = await service.getSession(ref, window);
			expect(session.step).toBe(SessionStep.SITTING);
			expect(session.postCount).toEqual({ post: 1, reply: 0, validPost: 1, validReply: 0 });
		});

		it("counts replies only to somebody else's post", async () => {
			const item = await seedDiscussion();
			const mine = refOf(item.id, "discussion");
			const theirs = refOf(item.id, "discussion", OTHER_LEARNER_ID);
			await service.startAttempt(mine);
			await service.startAttempt(theirs);

			const { post: own } = await service.createPost(mine, { title: "Mine", body: "Long enough post" });
			await service.createPost(mine, { parentId: own.id, title: "Re", body: "self reply" });
			const { grade: replied } = await service.createPost(theirs, { parentId: own.id, title: "Re", body: "nice one" });

			expect(replied.earnedDetails).toEqual({ post: 0, reply: 1, tutorAssessment: null });
			const session = await service.getSession(mine, window);
			expect(session.postCount).toEqual({ post: 1, reply: 1, validPost: 1, validReply: 0 });
		});

		it("does not take submissions", async () => {
			const item = await seedDiscussion();
			const ref = refOf(item.id, "discussion");
			await service.startAttempt(ref);

			await expect(service.submit(ref, { answer: "text" })).rejects.toMatchObject({ code: "SUBMISSION_NOT_ACCEPTED" });
		});

		it("rejects a reply to a post outside the discussion", async () => {
			const item = await seedDiscussion();
			const ref = refOf(item.id, "discussion");
			await service.startAttempt(ref);

			await expect(service.createPost(ref, {
				parentId: "0e7d4c1b-9999-4f00-9a00-000000000099",
				title: "Re",
				body: "orphan reply",
			})).rejects.toMatchObject({ code: "NOT_FOUND" });
		});
	});
});
