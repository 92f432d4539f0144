import type { NextFunction, Request, RequestHandler, Response } from "express";

type AsyncController = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/** Hands rejected controller promises, zod and domain errors included, to the error middleware. */
export const asyncHandler = (fn: AsyncController): RequestHandler => {
	return (req, res, next) => {
		fn(req, res, next).catch(next);
	};
};

export default asyncHandler;
