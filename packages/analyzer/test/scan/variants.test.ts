import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { buildVariantSet, exportModuleFacts, FactStore } from '../../src/index.ts'
import { FakeHost, method } from '../support/fake-host.ts'

describe('buildVariantSet', () => {
	it('should record pointer-receiver implementations pointer-qualified', () => {
		const host = new FakeHost()
		const union = host.addModule('union')
		union.contract('Result')
		union.pointerVariant('Success', 'isResult')
		union.pointerVariant('Error', 'isResult')

		const variants = buildVariantSet(union.unit, 'isResult', host)
		assert.deepEqual(variants.map(String), ['*Error', '*Success'])
	})

	it('should record value-receiver implementations bare', () => {
		const host = new FakeHost()
		const tokens = host.addModule('tokens')
		tokens.contract('Token')
		tokens.valueVariant('Ident', 'isToken')
		tokens.pointerVariant('Number', 'isToken')

		const variants = buildVariantSet(tokens.unit, 'isToken', host)
		assert.deepEqual(variants.map(String), ['*Number', 'Ident'])
	})

	it('should exclude types that implement neither form', () => {
		const host = new FakeHost()
		const shapes = host.addModule('shapes')
		shapes.contract('Shape')
		shapes.pointerVariant('Circle', 'isShape')
		shapes.concrete('Point', { value: [method('String', 0, 1)] })
		shapes.concrete('Unrelated')

		assert.deepEqual(buildVariantSet(shapes.unit, 'isShape', host).map(String), ['*Circle'])
	})

	it('should not treat abstract types as variants', () => {
		const host = new FakeHost()
		const shapes = host.addModule('shapes')
		shapes.contract('Shape')
		shapes.contract('Polygon', [method('isShape'), method('Sides', 0, 1)])
		shapes.pointerVariant('Square', 'isShape')

		assert.deepEqual(buildVariantSet(shapes.unit, 'isShape', host).map(String), ['*Square'])
	})

	it('should not look outside the module', () => {
		const host = new FakeHost()
		const shapes = host.addModule('shapes')
		shapes.contract('Shape')
		shapes.pointerVariant('Circle', 'isShape')
		host.addModule('other', ['shapes']).pointerVariant('Hexagon', 'isShape')

		assert.deepEqual(buildVariantSet(shapes.unit, 'isShape', host).map(String), ['*Circle'])
	})

	it('should yield the same order for the same module', () => {
		const host = new FakeHost()
		const shapes = host.addModule('shapes')
		shapes.contract('Shape')
		for (const name of ['Triangle', 'Circle', 'Rectangle']) shapes.pointerVariant(name, 'isShape')

		const first = buildVariantSet(shapes.unit, 'isShape', host).map(String)
		const second = buildVariantSet(shapes.unit, 'isShape', host).map(String)
		assert.deepEqual(first, ['*Circle', '*Rectangle', '*Triangle'])
		assert.deepEqual(second, first)
	})
})

describe('exportModuleFacts', () => {
	it('should export one fact per contract', () => {
		const host = new FakeHost()
		const union = host.addModule('example/union')
		union.contract('Result')
		union.contract('Shape')
		union.pointerVariant('Success', 'isResult')
		union.pointerVariant('Circle', 'isShape')

		const store = new FactStore()
		const facts = exportModuleFacts(union.unit, host, store)

		assert.deepEqual(
			facts.map((f) => f.contract),
			['example/union.Result', 'example/union.Shape']
		)
		assert.equal(facts[0]?.moduleName, 'union')
		assert.equal(store.count(), 2)
	})

	it('should export a contract with no variants', () => {
		const host = new FakeHost()
		const lonely = host.addModule('lonely')
		lonely.contract('Nothing')

		const store = new FactStore()
		const [fact] = exportModuleFacts(lonely.unit, host, store)
		assert.deepEqual(fact?.variants, [])
	})
})
