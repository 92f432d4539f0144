import type { ContentKind } from "../types";
import type { Database } from "./client";
import {
	assessableItem,
	assessment,
	course,
	enrollment,
	gradingPolicy,
	question,
	questionPool,
	verification,
} from "./schema";

type ItemValues = typeof assessableItem.$inferInsert;
type QuestionValues = typeof question.$inferInsert;

export const LEARNER_ID = "6f1c2a3e-1111-4a5b-8c9d-000000000001";
export const OTHER_LEARNER_ID = "6f1c2a3e-2222-4a5b-8c9d-000000000002";
export const GRADER_ID = "6f1c2a3e-3333-4a5b-8c9d-000000000003";

export async function seedPool(database: Database, composition: Record<string, number> = {}) {
	const [pool] = await database.insert(questionPool).values({ title: "Pool", composition }).returning();
	return pool;
}

export async function seedQuestion(database: Database, values: Omit<QuestionValues, "prompt"> & { prompt?: string }) {
	const [row] = await database.insert(question).values({ prompt: "Question", ...values }).returning();
	return row;
}

export async function seedItem(database: Database, values: Omit<ItemValues, "title"> & { title?: string }) {
	const [row] = await database.insert(assessableItem).values({ title: `Item ${values.kind}`, ...values }).returning();
	return row;
}

/** An exam with one objective question worth one point, correct answer "3.0". */
export async function seedExam(database: Database, values: Partial<ItemValues> = {}) {
	const pool = await seedPool(database, { number_input: 1 });
	const numeric = await seedQuestion(database, {
		poolId: pool.id,
		format: "number_input",
		correctAnswers: ["3.0"],
	});
	const item = await seedItem(database, {
		kind: "exam",
		questionPoolId: pool.id,
		durationSeconds: 600,
		...values,
	});
	return { pool, item, question: numeric };
}

export async function seedEnrollment(
	database: Database,
	values: { userId: string; contentKind: ContentKind; contentId: string; startAt: Date; endAt: Date; archiveAt: Date },
) {
	const [row] = await database.insert(enrollment).values({ ...values, enrolledAt: values.startAt }).returning();
	return row;
}

export async function seedVerification(database: Database, userId: string, consumerId: string, createdAt = new Date()) {
	const [row] = await database.insert(verification).values({ userId, consumerId, success: true, createdAt }).returning();
	return row;
}

export async function seedCourse(
	database: Database,
	policy: { assessmentWeight?: number; completionWeight?: number; completionPassingPoint?: number } = {},
) {
	const [row] = await database.insert(course).values({ title: "Course" }).returning();
	await database.insert(gradingPolicy).values({ courseId: row.id, ...policy });
	return row;
}

export async function seedAssessment(
	database: Database,
	values: { courseId: string; itemId: string; weight: number; startOffsetDays?: number; endOffsetDays?: number | null },
) {
	const [row] = await database.insert(assessment).values(values).returning();
	return row;
}
