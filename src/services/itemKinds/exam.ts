import { LearningError } from "../../helpers/LearningError";
import { parseNumber } from "../../helpers/TextHelper";
import type { EarnedDetails } from "../../types";
import { capped, shuffle } from "./shared";
import type { ItemKindPolicy } from "./types";

/** Exact match first, then numeric equality so "3.0" matches "3". */
export function isCorrectAnswer(answer: string, correctAnswers: string[]): boolean {
	if (correctAnswers.includes(answer)) {
		return true;
	}
	const value = parseNumber(answer);
	if (value === null) {
		return false;
	}
	return correctAnswers.some(correct => parseNumber(correct) === value);
}

export const examPolicy: ItemKindPolicy = {
	kind: "exam",
	hasDeadline: true,
	acceptsSubmission: true,
	gradesOnStart: false,

	selectContent(pool, questions) {
		const selected: string[] = [];
		for (const [format, count] of Object.entries(pool.composition)) {
			const candidates = questions.filter(question => question.format === format);
			const drawn = shuffle(candidates)
				.slice(0, count)
				.map(question => question.id)
				.sort();
			selected.push(...drawn);
		}
		if (selected.length === 0) {
			throw new LearningError("NO_QUESTION");
		}
		return selected;
	},

	validateSubmission(input, questions) {
		const composed = new Set(questions.map(question => question.id));
		const answers = Object.fromEntries(
			Object.entries(input.answers ?? {}).filter(([questionId]) => composed.has(questionId)),
		);
		if (Object.keys(answers).length === 0) {
			throw new LearningError("NO_ANSWERS");
		}
		return {
			answers,
			extractedText: Object.values(answers).join("\n"),
			attachments: [],
		};
	},

	scoreComponents({ questions, submission, supplied }) {
		const earnedDetails: EarnedDetails = {};
		let possiblePoint = 0;
		for (const question of questions) {
			possiblePoint += question.point;
			if (question.correctAnswers.length === 0) {
				// essays wait for a grader
				earnedDetails[question.id] = capped(supplied[question.id], question.point);
				continue;
			}
			const answer = submission?.answers[question.id];
			earnedDetails[question.id] = answer !== undefined && isCorrectAnswer(answer, question.correctAnswers)
				? question.point
				: 0;
		}
		return { earnedDetails, possiblePoint };
	},
};
