import type { Request, Response } from "express";
import { z } from "zod";
import ApiHelper from "../helpers/ApiHelper";
import asyncHandler from "../helpers/AsyncHandler";
import { requireUserId } from "../helpers/RequestScope";
import AccessWindowService, { type AccessIntent } from "../services/AccessWindowService";
import CourseGradingService from "../services/CourseGradingService";
import EngagementService from "../services/EngagementService";

const paramSchema = z.object({
	id: z.string().uuid(),
});

export default class CourseController {
	private static grading = new CourseGradingService();
	private static engagements = new EngagementService();
	private static access = new AccessWindowService();

	private static async scope(req: Request, intent: AccessIntent) {
		const learnerId = requireUserId(req);
		const { id } = paramSchema.parse(req.params);
		const { window } = await CourseController.access.authorize({
			learnerId,
			contentId: id,
			kind: "course",
			intent,
		});
		return { learnerId, courseId: id, window };
	}

	static session = asyncHandler(async (req: Request, res: Response) => {
		const { learnerId, courseId, window } = await CourseController.scope(req, "read");
		const session = await CourseController.grading.getCourseSession(courseId, learnerId, window);

		new ApiHelper(res).success(session);
	});

	static engage = asyncHandler(async (req: Request, res: Response) => {
		const { learnerId, courseId } = await CourseController.scope(req, "write");
		const engagement = await CourseController.engagements.startEngagement(courseId, learnerId);

		new ApiHelper(res).setCode(ApiHelper.CREATED).success(engagement);
	});

	static grade = asyncHandler(async (req: Request, res: Response) => {
		const { learnerId, courseId } = await CourseController.scope(req, "read");
		const result = await CourseController.grading.gradeCourse(courseId, learnerId);

		new ApiHelper(res).success(result);
	});

	static requestCertificate = asyncHandler(async (req: Request, res: Response) => {
		const { learnerId, courseId } = await CourseController.scope(req, "read");
		const request = await CourseController.grading.requestCertificate(courseId, learnerId);

		new ApiHelper(res).setCode(ApiHelper.CREATED).success(request);
	});
}
