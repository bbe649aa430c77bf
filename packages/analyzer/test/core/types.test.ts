import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	basicType,
	isAbstractNamed,
	namedType,
	pointerElemNamed,
	pointerTo,
	sameType,
	typeString,
} from '../../src/index.ts'

describe('sameType', () => {
	it('should compare named types by module and name', () => {
		assert.strictEqual(sameType(namedType('shapes', 'Circle'), namedType('shapes', 'Circle')), true)
		assert.strictEqual(sameType(namedType('shapes', 'Circle'), namedType('draw', 'Circle')), false)
	})

	it('should compare pointers by element', () => {
		const circle = namedType('shapes', 'Circle')
		assert.strictEqual(sameType(pointerTo(circle), pointerTo(circle)), true)
		assert.strictEqual(sameType(pointerTo(circle), circle), false)
	})

	it('should compare basic types by name', () => {
		assert.strictEqual(sameType(basicType('string'), basicType('string')), true)
		assert.strictEqual(sameType(basicType('string'), basicType('int')), false)
	})
})

describe('isAbstractNamed', () => {
	it('should accept only abstract named types', () => {
		assert.strictEqual(isAbstractNamed(namedType('shapes', 'Shape', true)), true)
		assert.strictEqual(isAbstractNamed(namedType('shapes', 'Circle')), false)
		assert.strictEqual(isAbstractNamed(pointerTo(namedType('shapes', 'Shape', true))), false)
	})
})

describe('pointerElemNamed', () => {
	it('should unwrap *T', () => {
		const circle = namedType('shapes', 'Circle')
		assert.strictEqual(pointerElemNamed(pointerTo(circle)), circle)
		assert.strictEqual(pointerElemNamed(circle), null)
	})
})

describe('typeString', () => {
	it('should omit the module of built-in types', () => {
		assert.strictEqual(typeString(pointerTo(namedType('lib/shapes', 'Circle'))), '*lib/shapes.Circle')
		assert.strictEqual(typeString(namedType('', 'error', true)), 'error')
	})
})
