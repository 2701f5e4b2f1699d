import { describe, expect, it } from 'vitest'
import {
	DuplicateColumnError,
	MissingColumnError,
	SchemaError,
	UndefinedColumnError,
} from './errors'
import { classifyHeader, resolveColumns } from './roster-schema'

describe('classifyHeader', () => {
	it('matches exact labels and the Tutorial prefix', () => {
		expect(classifyHeader('OrgDefinedId', 1)).toBe('id')
		expect(classifyHeader('Username', 2)).toBe('username')
		expect(classifyHeader('Tutorial 6 Points Grade', 3)).toBe('score')
		expect(classifyHeader('Tutorial', 3)).toBe('score')
	})

	it('is exact for id and username', () => {
		expect(() => classifyHeader('username', 2)).toThrow(UndefinedColumnError)
		expect(() => classifyHeader('OrgDefinedId ', 1)).toThrow(
			UndefinedColumnError
		)
	})

	it('rejects empty and non-text headers', () => {
		expect(() => classifyHeader(null, 3)).toThrow(
			'Undefined column name null in column 3'
		)
		expect(() => classifyHeader(6, 1)).toThrow(UndefinedColumnError)
	})
})

describe('resolveColumns', () => {
	it('maps roles to 1-based columns in any order', () => {
		expect(
			resolveColumns(['Tutorial 3', 'OrgDefinedId', 'Username'])
		).toEqual({ score: 1, id: 2, username: 3 })
	})

	it('only looks at the first three headers', () => {
		expect(
			resolveColumns(['OrgDefinedId', 'Username', 'Tutorial 1', 'Email'])
		).toEqual({ id: 1, username: 2, score: 3 })
	})

	it('fails on an unknown header', () => {
		const error = (() => {
			try {
				resolveColumns(['OrgDefinedId', 'Email', 'Tutorial 1'])
			} catch (e) {
				return e
			}
		})()

		expect(error).toBeInstanceOf(SchemaError)
		expect(error).toHaveProperty('header', 'Email')
		expect(error).toHaveProperty('column', 2)
	})

	it('fails when a role appears twice', () => {
		expect(() =>
			resolveColumns(['OrgDefinedId', 'Tutorial 1', 'Tutorial 2'])
		).toThrow(DuplicateColumnError)
	})

	it('fails when fewer than three headers are given', () => {
		expect(() => resolveColumns(['OrgDefinedId', 'Username'])).toThrow(
			MissingColumnError
		)
	})
})
