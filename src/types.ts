export const ITEM_KINDS = ["exam", "assignment", "discussion"] as const;

export type ItemKind = (typeof ITEM_KINDS)[number];

/** Everything an access window can be resolved for. */
export type ContentKind = ItemKind | "media" | "course";

export const QUESTION_FORMATS = [
	"single_choice",
	"text_input",
	"number_input",
	"essay",
	"assignment",
	"discussion",
] as const;

export type QuestionFormat = (typeof QUESTION_FORMATS)[number];

export interface AccessWindow {
	start: Date;
	end: Date;
	archive: Date;
}

export type AccessMode = "open" | "read-only";

export interface GradingDates {
	gradeDue: Date;
	appealDeadline: Date;
	confirmDue: Date;
}

export enum SessionStep {
	READY = "READY",
	SITTING = "SITTING",
	TIMEOUT = "TIMEOUT",
	GRADING = "GRADING",
	REVIEWING = "REVIEWING",
	FINAL = "FINAL",
}

/** Component key → earned points, `null` while a grader has not scored it. */
export type EarnedDetails = Record<string, number | null>;

export type AnswerMap = Record<string, string>;

export interface AttachmentMeta {
	name: string;
	size: number;
	contentType?: string;
}

export interface RubricCriterion {
	name: string;
	maxPoint: number;
}

export interface PointRequirements {
	post?: number;
	reply?: number;
	tutorAssessment?: number;
	postMinCharacters?: number;
	replyMinCharacters?: number;
}

export interface PostCount {
	post: number;
	reply: number;
	validPost: number;
	validReply: number;
}

export interface ScoreStats {
	total: number;
	avgScore: number;
	minScore: number;
	maxScore: number;
	distribution: Array<[number, number]>;
}
