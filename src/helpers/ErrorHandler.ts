import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import ApiHelper from "./ApiHelper";
import { LearningError } from "./LearningError";
import logger from "./Logger";

const log = logger.child("http");

// Express recognises error middleware by its four-parameter arity.
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
	const error = err instanceof Error ? err : new Error(String(err));
	const helper = new ApiHelper(res);

	if (error instanceof LearningError) {
		log.warn("Request rejected", { method: req.method, url: req.originalUrl, code: error.code });
	} else if (error instanceof z.ZodError) {
		log.warn("Request validation failed", { method: req.method, url: req.originalUrl });
	} else {
		log.error("Unhandled request error", {
			method: req.method,
			url: req.originalUrl,
			message: error.message,
			stack: error.stack,
		});
	}

	helper.error(error);
}

export default errorHandler;
