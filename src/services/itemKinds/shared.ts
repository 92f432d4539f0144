import { LearningError } from "../../helpers/LearningError";
import type { QuestionRow } from "../../db/schema";

export function shuffle<T>(values: readonly T[]): T[] {
	const result = [...values];
	for (let i = result.length - 1; i > 0; i--) {
		const j = Math.floor(Math.random() * (i + 1));
		[result[i], result[j]] = [result[j], result[i]];
	}
	return result;
}

/** One random question of the pool, for kinds that pose a single prompt. */
export function pickOne(questions: QuestionRow[]): string[] {
	if (questions.length === 0) {
		throw new LearningError("QUESTION_POOL_EMPTY");
	}
	return [questions[Math.floor(Math.random() * questions.length)].id];
}

/** A grader-supplied value capped to what the component is worth. */
export function capped(value: number | null | undefined, max: number): number | null {
	if (value === null || value === undefined) {
		return null;
	}
	return Math.min(Math.max(value, 0), max);
}

export function onlyQuestion(questions: QuestionRow[]): QuestionRow {
	const [first] = questions;
	if (!first) {
		throw new LearningError("NO_QUESTION");
	}
	return first;
}
