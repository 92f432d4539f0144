export const ERROR_STATUS = {
	UNAUTHENTICATED: 401,

	ACCESS_DENIED: 403,
	CONTENT_NOT_AVAILABLE: 403,
	CONTENT_READ_ONLY: 403,
	REVIEW_PERIOD_OVER: 403,
	OTP_VERIFICATION_REQUIRED: 403,
	NOT_QUALIFIED_FOR_CERTIFICATE: 403,

	NOT_FOUND: 404,

	ATTEMPT_ALREADY_STARTED: 409,
	ATTEMPT_ALREADY_SUBMITTED: 409,
	MAX_ATTEMPTS_REACHED: 409,
	ATTEMPT_HAS_EXPIRED: 409,
	ALREADY_EXISTS: 409,
	INVALID_STEP: 409,

	NO_ANSWERS: 400,
	ATTACHMENT_TOO_FEW: 400,
	ATTACHMENT_TOO_MANY: 400,
	ATTACHMENT_TOO_LARGE: 400,
	EMPTY_ANSWER: 400,
	NO_QUESTION: 400,
	QUESTION_POOL_EMPTY: 400,
	SUBMISSION_NOT_ACCEPTED: 400,
	CONFIRM_WITHOUT_COMPLETION: 400,
} as const;

export type ErrorCode = keyof typeof ERROR_STATUS;

/** A caller-recoverable failure with a stable code. */
export class LearningError extends Error {
	readonly status: number;

	constructor(
		readonly code: ErrorCode,
		message?: string,
	) {
		super(message ?? code);
		this.name = "LearningError";
		this.status = ERROR_STATUS[code];
	}
}

function readCode(value: unknown): string | undefined {
	if (typeof value !== "object" || value === null || !("code" in value)) {
		return undefined;
	}
	return typeof value.code === "string" ? value.code : undefined;
}

/**
 * True when a database error is a unique-constraint violation. Drizzle may
 * hand the driver error through as-is or wrap it in `cause`.
 */
export function isUniqueViolation(error: unknown): boolean {
	if (readCode(error) === "23505") {
		return true;
	}
	if (error instanceof Error && error.cause !== undefined) {
		return readCode(error.cause) === "23505";
	}
	return false;
}

export default LearningError;
