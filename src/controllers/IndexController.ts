import type { Request, Response } from "express";
import { checkDatabaseConnection } from "../db/health";
import ApiHelper from "../helpers/ApiHelper";
import asyncHandler from "../helpers/AsyncHandler";

export default class IndexController {
	static index = asyncHandler(async (_req: Request, res: Response) => {
		new ApiHelper(res).setCode(ApiHelper.OK).success({
			message: "Learning session service",
			date: new Date(),
		});
	});

	static health = asyncHandler(async (_req: Request, res: Response) => {
		const database = await checkDatabaseConnection();

		new ApiHelper(res)
			.setCode(database.connected ? ApiHelper.OK : ApiHelper.SERVICE_UNAVAILABLE)
			.success({ status: database.connected ? "ok" : "degraded", database });
	});

	static timestamp = asyncHandler(async (_req: Request, res: Response) => {
		new ApiHelper(res).success({ timestamp: Date.now() });
	});
}
