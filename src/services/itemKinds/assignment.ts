import env from "../../config/env";
import { LearningError } from "../../helpers/LearningError";
import { stripMarkup } from "../../helpers/TextHelper";
import type { EarnedDetails } from "../../types";
import { capped, onlyQuestion, pickOne } from "./shared";
import type { ItemKindPolicy } from "./types";

export const assignmentPolicy: ItemKindPolicy = {
	kind: "assignment",
	hasDeadline: false,
	acceptsSubmission: true,
	gradesOnStart: false,

	selectContent(_pool, questions) {
		return pickOne(questions);
	},

	validateSubmission(input, questions) {
		const question = onlyQuestion(questions);
		const attachments = input.attachments ?? [];
		const maxBytes = env.ATTACHMENT_MAX_SIZE_MB * 1024 * 1024;

		if (question.attachmentFileCount > 0 && attachments.length < question.attachmentFileCount) {
			throw new LearningError("ATTACHMENT_TOO_FEW", `At least ${question.attachmentFileCount} file(s) required`);
		}
		if (attachments.length > question.attachmentFileCount) {
			throw new LearningError("ATTACHMENT_TOO_MANY", `At most ${question.attachmentFileCount} file(s) allowed`);
		}
		const oversized = attachments.find(attachment => attachment.size > maxBytes);
		if (oversized) {
			throw new LearningError("ATTACHMENT_TOO_LARGE", `${oversized.name} exceeds ${env.ATTACHMENT_MAX_SIZE_MB}MB`);
		}

		const answer = input.answer ?? "";
		const extractedText = stripMarkup(answer);
		if (extractedText === "" && attachments.length === 0) {
			throw new LearningError("EMPTY_ANSWER");
		}
		return {
			answers: { [question.id]: answer },
			extractedText,
			attachments,
		};
	},

	scoreComponents({ questions, supplied }) {
		const question = onlyQuestion(questions);
		const earnedDetails: EarnedDetails = {};
		let possiblePoint = 0;
		for (const criterion of question.rubric) {
			possiblePoint += criterion.maxPoint;
			earnedDetails[criterion.name] = capped(supplied[criterion.name], criterion.maxPoint);
		}
		return { earnedDetails, possiblePoint };
	},
};
