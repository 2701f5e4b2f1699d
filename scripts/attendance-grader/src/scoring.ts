import { clamp } from 'es-toolkit'

export type ScoringPolicy = (
	oldScore: number,
	multiplicity: number,
	maxScore: number
) => number

export const scoringPolicyNames = ['occurrence', 'first-attendance'] as const

export type ScoringPolicyName = (typeof scoringPolicyNames)[number]

export const scoringPolicies: Record<ScoringPolicyName, ScoringPolicy> = {
	// this week's check-in count becomes the score, capped at the max; a student
	// already at the cap keeps it. the count replaces the old score.
	occurrence: (oldScore, multiplicity, maxScore) =>
		oldScore < maxScore ? clamp(multiplicity, 0, maxScore) : maxScore,

	// one point for showing up, never lowered by a later run
	'first-attendance': (oldScore, _multiplicity, maxScore) =>
		oldScore <= 0 ? 1 : clamp(oldScore, 0, maxScore),
}
