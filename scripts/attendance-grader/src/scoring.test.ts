import { describe, expect, it } from 'vitest'
import { scoringPolicies } from './scoring'

describe('occurrence policy', () => {
	const score = scoringPolicies.occurrence

	it('uses the check-in count below the cap', () => {
		expect(score(0, 1, 2)).toBe(1)
		expect(score(0, 2, 2)).toBe(2)
	})

	it('replaces partial credit instead of adding to it', () => {
		expect(score(1, 2, 2)).toBe(2)
		expect(score(1, 1, 2)).toBe(1)
	})

	it('caps the check-in count at the max score', () => {
		expect(score(0, 2, 1)).toBe(1)
		expect(score(0, 1, 1)).toBe(1)
	})

	it('never lowers a capped score', () => {
		expect(score(2, 1, 2)).toBe(2)
		expect(score(3, 1, 3)).toBe(3)
	})
})

describe('first-attendance policy', () => {
	const score = scoringPolicies['first-attendance']

	it('gives one point to a student with no credit', () => {
		expect(score(0, 1, 2)).toBe(1)
		expect(score(0, 2, 2)).toBe(1)
	})

	it('keeps existing credit up to the cap', () => {
		expect(score(2, 1, 2)).toBe(2)
		expect(score(1, 2, 3)).toBe(1)
		expect(score(5, 1, 2)).toBe(2)
	})
})
