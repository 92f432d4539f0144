import type { ItemKind } from "../../types";
import { assignmentPolicy } from "./assignment";
import { discussionPolicy } from "./discussion";
import { examPolicy } from "./exam";
import type { ItemKindPolicy } from "./types";

export const ITEM_KIND_POLICIES: Record<ItemKind, ItemKindPolicy> = {
	exam: examPolicy,
	assignment: assignmentPolicy,
	discussion: discussionPolicy,
};

export function policyFor(kind: ItemKind): ItemKindPolicy {
	return ITEM_KIND_POLICIES[kind];
}

export type { ItemKindPolicy, ScoringInput, SubmissionDraft, SubmitInput } from "./types";
