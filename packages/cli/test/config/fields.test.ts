import assert from 'node:assert'
import { describe, it } from 'node:test'
import { FieldReader, isTable } from '../../src/config/fields.ts'

describe('isTable', () => {
	it('should accept plain objects only', () => {
		assert.strictEqual(isTable({ a: 1 }), true)
		assert.strictEqual(isTable([]), false)
		assert.strictEqual(isTable(null), false)
		assert.strictEqual(isTable(new Date(0)), false)
	})
})

describe('FieldReader', () => {
	it('should return values of the right type', () => {
		const reader = new FieldReader({ flag: false, list: ['a'], name: 'x' }, [])
		assert.strictEqual(reader.string('name', 'fallback'), 'x')
		assert.strictEqual(reader.boolean('flag', true), false)
		assert.deepStrictEqual(reader.stringArray('list', []), ['a'])
	})

	it('should return the fallback for missing keys without warnings', () => {
		const warnings: string[] = []
		const reader = new FieldReader({}, warnings)
		assert.strictEqual(reader.string('name', 'fallback'), 'fallback')
		assert.deepStrictEqual(reader.pairs('pairs'), [])
		assert.deepStrictEqual(warnings, [])
	})

	it('should warn with the dotted key of a nested table', () => {
		const warnings: string[] = []
		const reader = new FieldReader({ outer: { flag: 'yes' } }, warnings)
		assert.strictEqual(reader.table('outer').boolean('flag', true), true)
		assert.deepStrictEqual(warnings, ['[PFCFG002] invalid value for "outer.flag": expected true or false'])
	})

	it('should reject values outside an allowed set', () => {
		const warnings: string[] = []
		const reader = new FieldReader({ mode: 'c' }, warnings)
		assert.strictEqual(reader.oneOf('mode', ['a', 'b'], 'a'), 'a')
		assert.deepStrictEqual(warnings, ['[PFCFG002] invalid value for "mode": expected one of a, b'])
	})

	it('should read string pairs', () => {
		const reader = new FieldReader({ pairs: [['a', 'b']] }, [])
		assert.deepStrictEqual(reader.pairs('pairs'), [['a', 'b']])
	})

	it('should warn when a table is not a table', () => {
		const warnings: string[] = []
		const reader = new FieldReader({ outer: 1 }, warnings)
		assert.strictEqual(reader.table('outer').string('name', 'x'), 'x')
		assert.deepStrictEqual(warnings, ['[PFCFG002] invalid value for "outer": expected a table'])
	})
})
