import { LearningError } from "../../helpers/LearningError";
import type { PointRequirements } from "../../types";
import { capped, onlyQuestion, pickOne } from "./shared";
import type { ItemKindPolicy } from "./types";

export const DEFAULT_POINT_REQUIREMENTS: Required<PointRequirements> = {
	post: 1,
	reply: 1,
	tutorAssessment: 1,
	postMinCharacters: 200,
	replyMinCharacters: 100,
};

export function pointRequirements(value: PointRequirements): Required<PointRequirements> {
	return { ...DEFAULT_POINT_REQUIREMENTS, ...value };
}

export const discussionPolicy: ItemKindPolicy = {
	kind: "discussion",
	hasDeadline: false,
	acceptsSubmission: false,
	gradesOnStart: true,

	selectContent(_pool, questions) {
		return pickOne(questions);
	},

	validateSubmission() {
		throw new LearningError("SUBMISSION_NOT_ACCEPTED", "Discussions are graded from posts");
	},

	scoreComponents({ questions, postCount, supplied }) {
		const requirements = pointRequirements(onlyQuestion(questions).pointRequirements);
		return {
			earnedDetails: {
				post: Math.min(postCount?.validPost ?? 0, requirements.post),
				reply: Math.min(postCount?.validReply ?? 0, requirements.reply),
				tutorAssessment: capped(supplied.tutorAssessment, requirements.tutorAssessment),
			},
			possiblePoint: requirements.post + requirements.reply + requirements.tutorAssessment,
		};
	},
};
