import type { Response } from "express";
import { z } from "zod";
import { LearningError } from "./LearningError";

export default class ApiHelper {
	static OK = 200;
	static CREATED = 201;
	static NO_CONTENT = 204;
	static BAD_REQUEST = 400;
	static UNAUTHORIZED = 401;
	static NOT_FOUND = 404;
	static INTERNAL_SERVER_ERROR = 500;
	static SERVICE_UNAVAILABLE = 503;

	private code: number | null = null;
	constructor(private readonly res: Response) {}

	setCode(code: number) {
		this.code = code;
		return this;
	}

	success(data: unknown) {
		const status = this.code ?? ApiHelper.OK;
		if (status === ApiHelper.NO_CONTENT) {
			this.res.status(status).end();
			return;
		}
		this.res
			.status(status)
			.json(data);
	}

	error(error: Error, data: unknown = null) {
		if (error instanceof z.ZodError) {
			this.res
				.status(this.code ?? ApiHelper.BAD_REQUEST)
				.json({
					error: "Validation error",
					details: error.issues.map(issue => ({
						field: issue.path.join('.'),
						message: issue.message,
						code: issue.code
					})),
					data,
				});
		} else if (error instanceof LearningError) {
			this.res
				.status(this.code ?? error.status)
				.json({
					error: error.code,
					message: error.message,
					data,
				});
		} else {
			this.res
				.status(this.code ?? ApiHelper.INTERNAL_SERVER_ERROR)
				.json({
					error: "Internal server error",
					data,
				});
		}
	}
}
