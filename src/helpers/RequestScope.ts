import type { Request } from "express";
import { z } from "zod";
import { ITEM_KINDS } from "../types";
import { LearningError } from "./LearningError";

const userIdSchema = z.string().uuid();

/** Caller identity, established upstream and passed in the `x-user-id` header. */
export function requireUserId(req: Request): string {
	const parsed = userIdSchema.safeParse(req.header("x-user-id"));
	if (!parsed.success) {
		throw new LearningError("UNAUTHENTICATED", "Missing or invalid x-user-id header");
	}
	return parsed.data;
}

export const itemParamsSchema = z.object({
	kind: z.enum(ITEM_KINDS),
	id: z.string().uuid(),
});

export const courseQuerySchema = z.object({
	course: z.string().uuid().optional(),
});
