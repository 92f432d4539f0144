import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import app from "../config/app";
import { db } from "../db/client";
import { resetTestDatabase } from "../db/testDatabase";
import { LEARNER_ID, seedEnrollment, seedExam } from "../db/testFixtures";

vi.mock("../db/client", async () => {
	const { createTestDatabase } = await import("../db/testDatabase");
	return { db: await createTestDatabase() };
});

const UNKNOWN_ID = "0e7d4c1b-9999-4f00-9a00-000000000099";

describe("LearningSessionController", () => {
	beforeEach(async () => {
		await resetTestDatabase(db);
		vi.useFakeTimers({ toFake: ["Date"] });
		vi.setSystemTime(new Date("2024-01-15T00:00:00Z"));
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	/** Exam the learner is enrolled in for January, archived at the end of February. */
	async function enrolledExam() {
		const exam = await seedExam(db);
		await seedEnrollment(db, {
			userId: LEARNER_ID,
			contentKind: "exam",
			contentId: exam.item.id,
			startAt: new Date("2024-01-01T00:00:00Z"),
			endAt: new Date("2024-02-01T00:00:00Z"),
			archiveAt: new Date("2024-03-01T00:00:00Z"),
		});
		return exam;
	}

	describe("request scope", () => {
		it("requires a caller identity", async () => {
			const response = await request(app).get(`/exam/${UNKNOWN_ID}/session`);

			expect(response.status).toBe(401);
			expect(response.body.error).toBe("UNAUTHENTICATED");
		});

		it("rejects an unknown item kind", async () => {
			const response = await request(app)
				.get(`/quiz/${UNKNOWN_ID}/session`)
				.set("x-user-id", LEARNER_ID);

			expect(response.status).toBe(400);
			expect(response.body.error).toBe("Validation error");
			expect(response.body.details[0].field).toBe("kind");
		});

		it("denies content without an enrollment", async () => {
			const { item } = await seedExam(db);

			const response = await request(app)
				.get(`/exam/${item.id}/session`)
				.set("x-user-id", LEARNER_ID);

			expect(response.status).toBe(403);
			expect(response.body.error).toBe("ACCESS_DENIED");
		});

		it("keeps content closed before the window opens", async () => {
			const { item } = await enrolledExam();
			vi.setSystemTime(new Date("2023-12-31T00:00:00Z"));

			const response = await request(app)
				.get(`/exam/${item.id}/session`)
				.set("x-user-id", LEARNER_ID);

			expect(response.status).toBe(403);
			expect(response.body.error).toBe("CONTENT_NOT_AVAILABLE");
		});
	});

	it("runs an exam from start to grading inside the open window", async () => {
		const { item, question } = await enrolledExam();

		const ready = await request(app).get(`/exam/${item.id}/session`).set("x-user-id", LEARNER_ID);
		expect(ready.status).toBe(200);
		expect(ready.body).toMatchObject({ step: "READY", accessMode: "open", context: "", verificationRequired: false });

		const started = await request(app).post(`/exam/${item.id}/attempt`).set("x-user-id", LEARNER_ID);
		expect(started.status).toBe(201);
		expect(started.body.questions).toHaveLength(1);
		expect(started.body.questions[0].id).toBe(question.id);
		expect(started.body.questions[0].correctAnswers).toBeUndefined();

		const saved = await request(app)
			.post(`/exam/${item.id}/attempt/save`)
			.set("x-user-id", LEARNER_ID)
			.send({ answers: { [question.id]: "2" } });
		expect(saved.status).toBe(200);
		expect(saved.body.answers).toEqual({ [question.id]: "2" });

		const submitted = await request(app)
			.post(`/exam/${item.id}/attempt/submit`)
			.set("x-user-id", LEARNER_ID)
			.send({ answers: { [question.id]: "3" } });
		expect(submitted.status).toBe(201);
		expect(submitted.body.grade).toMatchObject({ earnedPoint: 1, possiblePoint: 1, score: 100, passed: true });

		const grading = await request(app).get(`/exam/${item.id}/session`).set("x-user-id", LEARNER_ID);
		expect(grading.body.step).toBe("GRADING");
	});

	it("serves the session read-only after the window ends", async () => {
		const { item, question } = await enrolledExam();
		await request(app).post(`/exam/${item.id}/attempt`).set("x-user-id", LEARNER_ID);
		vi.setSystemTime(new Date("2024-02-15T00:00:00Z"));

		const session = await request(app).get(`/exam/${item.id}/session`).set("x-user-id", LEARNER_ID);
		expect(session.status).toBe(200);
		expect(session.body.accessMode).toBe("read-only");

		const submitted = await request(app)
			.post(`/exam/${item.id}/attempt/submit`)
			.set("x-user-id", LEARNER_ID)
			.send({ answers: { [question.id]: "3" } });
		expect(submitted.status).toBe(403);
		expect(submitted.body.error).toBe("CONTENT_READ_ONLY");
	});

	it("closes everything after the archive date", async () => {
		const { item } = await enrolledExam();
		vi.setSystemTime(new Date("2024-03-02T00:00:00Z"));

		const response = await request(app).get(`/exam/${item.id}/session`).set("x-user-id", LEARNER_ID);

		expect(response.status).toBe(403);
		expect(response.body.error).toBe("REVIEW_PERIOD_OVER");
	});

	it("validates the submission body", async () => {
		const { item, question } = await enrolledExam();
		await request(app).post(`/exam/${item.id}/attempt`).set("x-user-id", LEARNER_ID);

		const response = await request(app)
			.post(`/exam/${item.id}/attempt/submit`)
			.set("x-user-id", LEARNER_ID)
			.send({ answers: { [question.id]: 3 } });

		expect(response.status).toBe(400);
		expect(response.body.details[0].field).toBe(`answers.${question.id}`);
	});

	it("reports a second start as a conflict", async () => {
		const { item } = await enrolledExam();
		await request(app).post(`/exam/${item.id}/attempt`).set("x-user-id", LEARNER_ID);

		const again = await request(app).post(`/exam/${item.id}/attempt`).set("x-user-id", LEARNER_ID);

		expect(again.status).toBe(409);
		expect(again.body.error).toBe("ATTEMPT_ALREADY_STARTED");
	});

	it("accepts posts only on discussions", async () => {
		const { item } = await enrolledExam();

		const response = await request(app)
			.post(`/exam/${item.id}/posts`)
			.set("x-user-id", LEARNER_ID)
			.send({ title: "Hello", body: "World" });

		expect(response.status).toBe(404);
	});
});
