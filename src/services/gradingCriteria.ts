import type { CriterionResult } from "../db/schema";
import type { ItemKind } from "../types";

export const COMPLETION_KEY = "completion";

interface CriterionBase {
	key: string;
	weight: number;
	passingPoint: number;
	startDate?: Date;
	endDate?: Date | null;
}

export interface CompletionCriterion extends CriterionBase {
	kind: "completion";
}

export interface AssessmentCriterion extends CriterionBase {
	kind: "assessment";
	itemId: string;
	itemKind: ItemKind;
	title: string;
}

export type Criterion = CompletionCriterion | AssessmentCriterion;

export type WeightedCriterion = Criterion & { normalizedWeight: number };

export interface WeightTotals {
	assessmentWeight: number;
	completionWeight: number;
}

export interface CriteriaEvaluation {
	details: Record<string, CriterionResult | null>;
	score: number;
	passed: boolean;
}

/**
 * Spreads the course total over its criteria. Completion takes its exact share
 * of the total. Assessments split the assessment share by raw weight, each
 * rounded half-up to one decimal, and the rounding residual lands on the
 * largest raw weight (first one on ties) so they sum to the exact share.
 */
export function normalizeWeights(totals: WeightTotals, criteria: Criterion[]): WeightedCriterion[] {
	if (criteria.length === 1) {
		return criteria.map(criterion => ({ ...criterion, normalizedWeight: 100 }));
	}

	const total = totals.assessmentWeight + totals.completionWeight;
	if (total === 0) {
		return criteria.map(criterion => ({ ...criterion, normalizedWeight: 0 }));
	}

	// integer arithmetic in tenths of a percent; only the residual may be fractional
	const weightSum = criteria
		.filter(criterion => criterion.kind === "assessment")
		.reduce((sum, criterion) => sum + criterion.weight, 0);
	const shareTenths = totals.assessmentWeight * 1000 / total;
	const denominator = weightSum * total;

	const tenths = criteria.map(criterion => {
		if (criterion.kind === "completion" || weightSum === 0) {
			return 0;
		}
		const numerator = criterion.weight * totals.assessmentWeight * 1000;
		return Math.floor((2 * numerator + denominator) / (2 * denominator));
	});

	if (weightSum > 0) {
		let largest = -1;
		let assigned = 0;
		criteria.forEach((criterion, index) => {
			if (criterion.kind !== "assessment") return;
			assigned += tenths[index];
			if (largest === -1 || criterion.weight > criteria[largest].weight) {
				largest = index;
			}
		});
		tenths[largest] += shareTenths - assigned;
	}

	return criteria.map((criterion, index) => ({
		...criterion,
		normalizedWeight: criterion.kind === "completion"
			? totals.completionWeight * 100 / total
			: tenths[index] / 10,
	}));
}

/**
 * Final score is the weighted sum of the values that exist; the course is
 * passed only when every criterion has a value at or above its threshold.
 */
export function evaluateCriteria(
	criteria: WeightedCriterion[],
	values: ReadonlyMap<string, number | null>,
): CriteriaEvaluation {
	const details: Record<string, CriterionResult | null> = {};
	let score = 0;
	let passed = true;

	for (const criterion of criteria) {
		const value = values.get(criterion.key) ?? null;
		if (value === null) {
			details[criterion.key] = null;
			passed = false;
			continue;
		}
		const criterionPassed = value >= criterion.passingPoint;
		details[criterion.key] = { value, passingPoint: criterion.passingPoint, passed: criterionPassed };
		passed = passed && criterionPassed;
		if (criterion.normalizedWeight > 0) {
			score += value * criterion.normalizedWeight / 100;
		}
	}
	return { details, score, passed };
}
