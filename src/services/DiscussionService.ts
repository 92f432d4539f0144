import { and, eq } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import { db, type Executor } from "../db/client";
import { attempt, discussionPost, type AttemptRow, type DiscussionPostRow, type QuestionRow } from "../db/schema";
import { LearningError } from "../helpers/LearningError";
import type { PostCount } from "../types";
import { pointRequirements } from "./itemKinds/discussion";

export interface PostInput {
	parentId?: string;
	title: string;
	body: string;
}

export default class DiscussionService {

	async createPost(owner: AttemptRow, input: PostInput, executor: Executor = db): Promise<DiscussionPostRow> {
		if (input.parentId) {
			// replies stay inside the same discussion item
			const [parent] = await executor.select({ id: discussionPost.id })
				.from(discussionPost)
				.innerJoin(attempt, eq(attempt.id, discussionPost.attemptId))
				.where(and(eq(discussionPost.id, input.parentId), eq(attempt.itemId, owner.itemId)));
			if (!parent) {
				throw new LearningError("NOT_FOUND", "Parent post not found");
			}
		}

		const [post] = await executor.insert(discussionPost).values({
			attemptId: owner.id,
			parentId: input.parentId ?? null,
			title: input.title,
			body: input.body,
			createdAt: new Date(),
		}).returning();
		return post;
	}

	/**
	 * Posts and replies written under an attempt. A reply is only valid when
	 * it answers somebody else's post.
	 */
	async countPosts(owner: AttemptRow, question: QuestionRow, executor: Executor = db): Promise<PostCount> {
		const requirements = pointRequirements(question.pointRequirements);
		const parent = alias(discussionPost, "parent_post");
		const parentAttempt = alias(attempt, "parent_attempt");

		const posts = await executor.select({
			body: discussionPost.body,
			parentId: discussionPost.parentId,
			parentLearnerId: parentAttempt.learnerId,
		})
			.from(discussionPost)
			.leftJoin(parent, eq(parent.id, discussionPost.parentId))
			.leftJoin(parentAttempt, eq(parentAttempt.id, parent.attemptId))
			.where(eq(discussionPost.attemptId, owner.id));

		const count: PostCount = { post: 0, reply: 0, validPost: 0, validReply: 0 };
		for (const post of posts) {
			if (post.parentId === null) {
				count.post++;
				if (post.body.length >= requirements.postMinCharacters) count.validPost++;
				continue;
			}
			count.reply++;
			const toSomebodyElse = post.parentLearnerId !== null && post.parentLearnerId !== owner.learnerId;
			if (toSomebodyElse && post.body.length >= requirements.replyMinCharacters) count.validReply++;
		}
		return count;
	}
}
