import type { Request, Response } from "express";
import { z } from "zod";
import ApiHelper from "../helpers/ApiHelper";
import asyncHandler from "../helpers/AsyncHandler";
import { courseQuerySchema, itemParamsSchema, requireUserId } from "../helpers/RequestScope";
import AccessWindowService, { type AccessIntent } from "../services/AccessWindowService";
import AttemptService from "../services/AttemptService";
import EngagementService, { normalizeContext } from "../services/EngagementService";
import type { ItemKind } from "../types";

const attachmentSchema = z.object({
	name: z.string().min(1),
	size: z.number().int().nonnegative(),
	contentType: z.string().optional(),
});

export default class LearningSessionController {
	private static attempts = new AttemptService();
	private static access = new AccessWindowService();
	private static engagements = new EngagementService();

	private static async scope(req: Request, intent: AccessIntent, kind?: ItemKind) {
		const learnerId = requireUserId(req);
		const params = itemParamsSchema.parse({ kind: kind ?? req.params.kind, id: req.params.id });
		const { course } = courseQuerySchema.parse(req.query);

		const context = await LearningSessionController.engagements.resolveContext(learnerId, course);
		const { window, mode } = await LearningSessionController.access.authorize({
			learnerId,
			contentId: params.id,
			kind: params.kind,
			courseId: course,
			intent,
		});
		return {
			ref: { kind: params.kind, itemId: params.id, learnerId, context },
			window,
			mode,
		};
	}

	static session = asyncHandler(async (req: Request, res: Response) => {
		const { ref, window, mode } = await LearningSessionController.scope(req, "read");
		const view = await LearningSessionController.attempts.getSession(ref, window);

		new ApiHelper(res).success({
			...view,
			accessMode: mode,
			context: normalizeContext(ref.context),
		});
	});

	static start = asyncHandler(async (req: Request, res: Response) => {
		const { ref } = await LearningSessionController.scope(req, "write");
		const started = await LearningSessionController.attempts.startAttempt(ref);

		new ApiHelper(res).setCode(ApiHelper.CREATED).success(started);
	});

	static save = asyncHandler(async (req: Request, res: Response) => {
		const saveSchema = z.object({
			answers: z.record(z.string(), z.string()),
		});

		const { ref } = await LearningSessionController.scope(req, "write");
		const { answers } = saveSchema.parse(req.body);
		const saved = await LearningSessionController.attempts.saveProgress(ref, answers);

		new ApiHelper(res).success({ answers: saved });
	});

	static submit = asyncHandler(async (req: Request, res: Response) => {
		const submitSchema = z.object({
			answers: z.record(z.string(), z.string()).optional(),
			answer: z.string().optional(),
			attachments: z.array(attachmentSchema).optional(),
		});

		const { ref } = await LearningSessionController.scope(req, "write");
		const input = submitSchema.parse(req.body);
		const result = await LearningSessionController.attempts.submit(ref, input);

		new ApiHelper(res).setCode(ApiHelper.CREATED).success(result);
	});

	static deactivate = asyncHandler(async (req: Request, res: Response) => {
		const { ref } = await LearningSessionController.scope(req, "write");
		const attempt = await LearningSessionController.attempts.deactivate(ref);

		new ApiHelper(res).success({ attempt });
	});

	static createPost = asyncHandler(async (req: Request, res: Response) => {
		const postSchema = z.object({
			parentId: z.string().uuid().optional(),
			title: z.string().min(1).max(200),
			body: z.string().min(1),
		});

		const { ref } = await LearningSessionController.scope(req, "write", "discussion");
		const input = postSchema.parse(req.body);
		const result = await LearningSessionController.attempts.createPost(ref, input);

		new ApiHelper(res).setCode(ApiHelper.CREATED).success(result);
	});

	static appeal = asyncHandler(async (req: Request, res: Response) => {
		const appealSchema = z.object({
			questionId: z.string().uuid(),
			explanation: z.string().min(1),
		});

		// appeals are filed after the window closes, so the read-only phase is enough
		const { ref } = await LearningSessionController.scope(req, "read");
		const input = appealSchema.parse(req.body);
		const filed = await LearningSessionController.attempts.createAppeal(ref, input);

		new ApiHelper(res).setCode(ApiHelper.CREATED).success(filed);
	});
}
