import type { Request, Response } from "express";
import { z } from "zod";
import ApiHelper from "../helpers/ApiHelper";
import asyncHandler from "../helpers/AsyncHandler";
import { requireUserId } from "../helpers/RequestScope";
import CourseGradingService from "../services/CourseGradingService";
import GradeService from "../services/GradeService";

/** Grader-side endpoints. Who may grade is decided upstream. */
export default class GradingController {
	private static grades = new GradeService();
	private static courses = new CourseGradingService();

	static review = asyncHandler(async (req: Request, res: Response) => {
		const paramSchema = z.object({ gradeId: z.string().uuid() });
		const reviewSchema = z.object({
			earnedDetails: z.record(z.string(), z.number().int().min(0).nullable()),
			feedback: z.record(z.string(), z.string()).optional(),
		});

		const graderId = requireUserId(req);
		const { gradeId } = paramSchema.parse(req.params);
		const input = reviewSchema.parse(req.body);
		const grade = await GradingController.grades.review(gradeId, { ...input, graderId });

		new ApiHelper(res).success(grade);
	});

	static complete = asyncHandler(async (req: Request, res: Response) => {
		const paramSchema = z.object({ gradeId: z.string().uuid() });

		const graderId = requireUserId(req);
		const { gradeId } = paramSchema.parse(req.params);
		const grade = await GradingController.grades.complete(gradeId, graderId);

		new ApiHelper(res).success(grade);
	});

	static confirm = asyncHandler(async (req: Request, res: Response) => {
		const paramSchema = z.object({ gradeId: z.string().uuid() });

		const graderId = requireUserId(req);
		const { gradeId } = paramSchema.parse(req.params);
		const grade = await GradingController.grades.confirm(gradeId, graderId);

		new ApiHelper(res).success(grade);
	});

	static closeAppeal = asyncHandler(async (req: Request, res: Response) => {
		const paramSchema = z.object({ appealId: z.string().uuid() });
		const closeSchema = z.object({ review: z.string().default("") });

		requireUserId(req);
		const { appealId } = paramSchema.parse(req.params);
		const { review } = closeSchema.parse(req.body);
		const appeal = await GradingController.grades.closeAppeal(appealId, review);

		new ApiHelper(res).success(appeal);
	});

	static gradeCourse = asyncHandler(async (req: Request, res: Response) => {
		const paramSchema = z.object({
			courseId: z.string().uuid(),
			learnerId: z.string().uuid(),
		});

		const graderId = requireUserId(req);
		const { courseId, learnerId } = paramSchema.parse(req.params);
		const result = await GradingController.courses.gradeCourse(courseId, learnerId, graderId);

		new ApiHelper(res).success(result);
	});

	static confirmGradebook = asyncHandler(async (req: Request, res: Response) => {
		const paramSchema = z.object({ gradebookId: z.string().uuid() });

		const graderId = requireUserId(req);
		const { gradebookId } = paramSchema.parse(req.params);
		const gradebook = await GradingController.courses.confirmGradebook(gradebookId, graderId);

		new ApiHelper(res).success(gradebook);
	});
}
