import type { QuestionPoolRow, QuestionRow, SubmissionRow } from "../../db/schema";
import type { AnswerMap, AttachmentMeta, EarnedDetails, ItemKind, PostCount } from "../../types";

export interface SubmitInput {
	answers?: AnswerMap;
	answer?: string;
	attachments?: AttachmentMeta[];
}

/** What gets persisted as the Submission of an attempt. */
export interface SubmissionDraft {
	answers: AnswerMap;
	extractedText: string;
	attachments: AttachmentMeta[];
}

export interface ScoringInput {
	// in the order the attempt was composed
	questions: QuestionRow[];
	submission: SubmissionRow | null;
	postCount: PostCount | null;
	// earned details already on the grade, merged with grader overrides
	supplied: EarnedDetails;
}

export interface ScoredComponents {
	earnedDetails: EarnedDetails;
	possiblePoint: number;
}

/**
 * Behaviour that differs between item kinds. The attempt state machine and
 * the grade aggregator only talk to items through this table entry.
 */
export interface ItemKindPolicy {
	kind: ItemKind;
	hasDeadline: boolean;
	acceptsSubmission: boolean;
	gradesOnStart: boolean;
	selectContent(pool: QuestionPoolRow, questions: QuestionRow[]): string[];
	validateSubmission(input: SubmitInput, questions: QuestionRow[]): SubmissionDraft;
	scoreComponents(input: ScoringInput): ScoredComponents;
}
