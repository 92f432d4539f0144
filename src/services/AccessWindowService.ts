import { and, eq, gte, lte } from "drizzle-orm";
import { db } from "../db/client";
import {
	assessment,
	enrollment,
	lesson,
	lessonMedia,
	publicAccessMedia,
} from "../db/schema";
import { LearningError } from "../helpers/LearningError";
import logger from "../helpers/Logger";
import type { AccessMode, AccessWindow, ContentKind, GradingDates } from "../types";

const log = logger.child("access");

const DAY_MS = 24 * 60 * 60 * 1000;

export type AccessIntent = "read" | "write";

export interface AccessRequest {
	learnerId: string;
	contentId: string;
	kind: ContentKind;
	courseId?: string;
	intent: AccessIntent;
}

export interface DayOffsets {
	startOffsetDays: number;
	endOffsetDays: number | null;
}

export function addDays(date: Date, days: number): Date {
	return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Union of two windows: earliest start, latest end, latest archive.
 * Throws ACCESS_DENIED when neither side grants anything.
 */
export function mergeWindows(a?: AccessWindow | null, b?: AccessWindow | null): AccessWindow {
	if (a && b) {
		return {
			start: a.start <= b.start ? a.start : b.start,
			end: a.end >= b.end ? a.end : b.end,
			archive: a.archive >= b.archive ? a.archive : b.archive,
		};
	}
	const window = a ?? b;
	if (!window) {
		throw new LearningError("ACCESS_DENIED");
	}
	return window;
}

/**
 * Course-relative window of a piece of content. The end offset counts from the
 * shifted start; the archive always follows the course.
 */
export function applyCourseOffset(courseWindow: AccessWindow, offsets: DayOffsets): AccessWindow {
	const start = addDays(courseWindow.start, offsets.startOffsetDays);
	return {
		start,
		end: offsets.endOffsetDays === null
			? courseWindow.end
			: addDays(start, offsets.endOffsetDays),
		archive: courseWindow.archive,
	};
}

export function evaluateWindow(window: AccessWindow, now: Date): AccessMode {
	if (now < window.start) {
		throw new LearningError("CONTENT_NOT_AVAILABLE");
	}
	if (now >= window.archive) {
		throw new LearningError("REVIEW_PERIOD_OVER");
	}
	return now >= window.end ? "read-only" : "open";
}

export function assertAccess(mode: AccessMode, intent: AccessIntent) {
	if (mode === "read-only" && intent === "write") {
		throw new LearningError("CONTENT_READ_ONLY");
	}
}

export function gradingDates(
	item: { gradeDueDays: number; appealDeadlineDays: number; confirmDueDays: number },
	window: AccessWindow,
): GradingDates {
	const gradeDue = addDays(window.end, item.gradeDueDays);
	const appealDeadline = addDays(gradeDue, item.appealDeadlineDays);
	return {
		gradeDue,
		appealDeadline,
		confirmDue: addDays(appealDeadline, item.confirmDueDays),
	};
}

export default class AccessWindowService {

	async resolve(learnerId: string, contentId: string, kind: ContentKind, courseId?: string): Promise<AccessWindow> {
		const now = new Date();
		const [enrolled] = await db.select({
			start: enrollment.startAt,
			end: enrollment.endAt,
			archive: enrollment.archiveAt,
		})
			.from(enrollment)
			.where(and(
				eq(enrollment.userId, learnerId),
				eq(enrollment.contentKind, courseId ? "course" : kind),
				eq(enrollment.contentId, courseId ?? contentId),
				eq(enrollment.active, true),
			));

		let publicWindow: AccessWindow | undefined;
		if (kind === "media") {
			[publicWindow] = await db.select({
				start: publicAccessMedia.startAt,
				end: publicAccessMedia.endAt,
				archive: publicAccessMedia.archiveAt,
			})
				.from(publicAccessMedia)
				.where(and(
					eq(publicAccessMedia.mediaId, contentId),
					lte(publicAccessMedia.startAt, now),
					gte(publicAccessMedia.archiveAt, now),
				));
		}

		const window = mergeWindows(enrolled, publicWindow);
		if (!courseId || kind === "course") {
			return window;
		}

		const offsets = await this.courseOffsets(courseId, contentId, kind);
		if (!offsets) {
			log.warn("content is not part of the course", { courseId, contentId, kind });
			throw new LearningError("ACCESS_DENIED");
		}
		return applyCourseOffset(window, offsets);
	}

	/** Resolves the window and checks it against the current time for the given intent. */
	async authorize(request: AccessRequest): Promise<{ window: AccessWindow; mode: AccessMode }> {
		const window = await this.resolve(request.learnerId, request.contentId, request.kind, request.courseId);
		const mode = evaluateWindow(window, new Date());
		assertAccess(mode, request.intent);
		return { window, mode };
	}

	private async courseOffsets(courseId: string, contentId: string, kind: ContentKind): Promise<DayOffsets | undefined> {
		if (kind === "media") {
			const [row] = await db.select({
				startOffsetDays: lesson.startOffsetDays,
				endOffsetDays: lesson.endOffsetDays,
			})
				.from(lessonMedia)
				.innerJoin(lesson, eq(lesson.id, lessonMedia.lessonId))
				.where(and(eq(lesson.courseId, courseId), eq(lessonMedia.mediaId, contentId)))
				.orderBy(lesson.ordering)
				.limit(1);
			return row;
		}

		const [row] = await db.select({
			startOffsetDays: assessment.startOffsetDays,
			endOffsetDays: assessment.endOffsetDays,
		})
			.from(assessment)
			.where(and(eq(assessment.courseId, courseId), eq(assessment.itemId, contentId)));
		return row;
	}
}
