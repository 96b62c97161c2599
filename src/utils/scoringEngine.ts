/*
 * Copyright (c) 2023, salesforce.com, inc.
 * All rights reserved.
 * Licensed under the BSD 3-Clause license.
 * For full license text, see LICENSE.txt file in the repo root or https://opensource.org/licenses/BSD-3-Clause
 */
import type {
	Finding,
	ObjectSchema,
	OperationOutcome,
	OperationPlan,
	Rating,
	RubricCategory,
	ScoreReport,
} from '../types/index.js';
import { CATEGORIES, CATEGORY_MAX, DEFAULT_RUBRIC, type RubricRule, type ScoringSettings } from './scoringRubric.js';

const BANDS: ReadonlyArray<[number, Rating]> = [
	[117, 'Excellent'],
	[104, 'Very Good'],
	[91, 'Good'],
	[78, 'Needs Work'],
];

export function ratingFor(total: number): Rating {
	for (const [floor, rating] of BANDS) {
		if (total >= floor) return rating;
	}
	return 'Critical';
}

function clamp(value: number, max: number): number {
	return Math.min(Math.max(value, 0), max);
}

function describe(rule: RubricRule, fired: boolean): string {
	if (rule.points >= 0) return `${fired ? 'Met' : 'Not met'}: ${rule.description}`;
	return `${fired ? 'Triggered' : 'Clear'}: ${rule.description}`;
}

/**
 * Scores a plan, and optionally its outcome, against the rubric. The result
 * is informational; nothing here stops an operation from running.
 */
export class ScoringEngine {
	public constructor(
		private readonly settings: ScoringSettings,
		private readonly rubric: readonly RubricRule[] = DEFAULT_RUBRIC
	) {}

	public score(plan: OperationPlan, outcome?: OperationOutcome, schema?: ObjectSchema): ScoreReport {
		const context = { plan, outcome, schema, settings: this.settings };
		const raw: Record<RubricCategory, number> = {
			queryEfficiency: 0,
			bulkSafety: 0,
			dataIntegrity: 0,
			security: 0,
			testPatterns: 0,
			cleanupIsolation: 0,
			documentation: 0,
		};
		const findings: Finding[] = [];

		for (const rule of this.rubric) {
			const fired = rule.evaluate(context);
			const delta = fired ? rule.points : 0;
			raw[rule.category] += delta;
			findings.push({ ruleId: rule.id, category: rule.category, delta, message: describe(rule, fired) });
		}

		const categoryScores = { ...raw };
		let total = 0;
		for (const category of CATEGORIES) {
			categoryScores[category] = clamp(raw[category], CATEGORY_MAX[category]);
			total += categoryScores[category];
		}

		return Object.freeze({
			categoryScores: Object.freeze(categoryScores),
			total,
			rating: ratingFor(total),
			findings: Object.freeze(findings),
		});
	}
}
