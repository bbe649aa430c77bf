import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import {
	AnalysisContext,
	type AnalyzerOptions,
	analyze,
	basicType,
	InvariantError,
	ModuleGraphError,
	namedType,
	pointerTo,
	type Statement,
} from '../../src/index.ts'
import { ERROR_TYPE, FakeHost, type FakeModule } from '../support/fake-host.ts'

function unionFixture(host = new FakeHost(), path = 'union') {
	const union = host.addModule(path, [], 'union')
	const result = union.contract('Result')
	const success = union.pointerVariant('Success', 'isResult')
	const error = union.pointerVariant('Error', 'isResult')
	const shape = union.contract('Shape')
	const circle = union.pointerVariant('Circle', 'isShape')
	const rectangle = union.pointerVariant('Rectangle', 'isShape')
	const triangle = union.pointerVariant('Triangle', 'isShape')
	return { circle, error, host, rectangle, result, shape, success, triangle, union }
}

async function messages(host: FakeHost, options?: AnalyzerOptions): Promise<string[]> {
	const result = await analyze(host, options)
	return result.context.getDiagnostics().map((d) => d.message)
}

function returnString(host: FakeHost): Statement {
	return host.returns(host.value(basicType('string')))
}

describe('exhaustiveness', () => {
	it('should report the missing variant of a switch without default', async () => {
		const { host, result, success, union } = unionFixture()
		union.func('HandleResult', [
			host.typeSwitch(host.value(result, 'r'), [
				host.caseClause([host.arm(pointerTo(success))], [returnString(host)]),
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Result: union.*Error',
		])
	})

	it('should not report a complete switch', async () => {
		const { host, result, success, error, union } = unionFixture()
		union.func('HandleResultComplete', [
			host.typeSwitch(host.value(result), [
				host.caseClause([host.arm(pointerTo(success))]),
				host.caseClause([host.arm(pointerTo(error))]),
			]),
		])
		union.func('HandleResultCompleteWithDefault', [
			host.typeSwitch(host.value(result), [
				host.caseClause([host.arm(pointerTo(success)), host.arm(pointerTo(error))]),
				host.defaultClause([host.panicCall()]),
			]),
		])

		assert.deepEqual(await messages(host), [])
	})

	it('should list missing variants in sorted order under a panic default', async () => {
		const { circle, host, shape, union } = unionFixture()
		union.func('Area', [
			host.typeSwitch(host.value(shape, 's'), [
				host.caseClause([host.arm(pointerTo(circle))]),
				host.defaultClause([host.panicCall()]),
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Shape: union.*Rectangle, union.*Triangle',
		])
	})

	it('should list every variant when no arm handles one', async () => {
		const { host, shape, union } = unionFixture()
		union.func('Never', [host.typeSwitch(host.value(shape), [host.defaultClause([host.panicCall()])])])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Shape: union.*Circle, union.*Rectangle, union.*Triangle',
		])
	})

	it('should skip switches with an intentional default', async () => {
		const { circle, host, shape, union } = unionFixture()
		union.func('AreaWithDefault', [
			host.typeSwitch(host.value(shape), [
				host.caseClause([host.arm(pointerTo(circle))]),
				host.defaultClause([host.returns(host.value(basicType('float64')))]),
			]),
		])
		union.func('NilDefault', [
			host.typeSwitch(host.value(shape), [
				host.caseClause([host.arm(pointerTo(circle))]),
				host.defaultClause([host.returns(host.nil(), host.nil())]),
			]),
		])

		assert.deepEqual(await messages(host), [])
	})

	it('should enforce the check under an error-returning default', async () => {
		const { circle, host, shape, union } = unionFixture()
		union.func('Parse', [
			host.typeSwitch(host.value(shape), [
				host.caseClause([host.arm(pointerTo(circle))]),
				host.defaultClause([host.returns(host.value(basicType('int')), host.value(ERROR_TYPE, 'err'))]),
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Shape: union.*Rectangle, union.*Triangle',
		])
	})

	it('should honour the sole-statement rule when asked', async () => {
		const { circle, host, shape, union } = unionFixture()
		union.func('Logged', [
			host.typeSwitch(host.value(shape), [
				host.caseClause([host.arm(pointerTo(circle))]),
				host.defaultClause([host.call('logUnexpected'), host.panicCall()]),
			]),
		])

		assert.equal((await messages(host)).length, 1)
		assert.deepEqual(await messages(host, { defaultArmRule: 'sole-statement' }), [])
	})
})

describe('dispatch site matching', () => {
	it('should skip switches on contracts without a fact', async () => {
		const host = new FakeHost()
		const mod = host.addModule('plain')
		const stringer = mod.contract('Stringer', [])
		mod.func('Describe', [host.typeSwitch(host.value(stringer), [host.defaultClause([host.panicCall()])])])

		assert.deepEqual(await messages(host), [])
	})

	it('should skip switches whose subject does not resolve or is concrete', async () => {
		const { circle, host, union } = unionFixture()
		union.func('Unknown', [host.typeSwitch(host.opaque(), [host.defaultClause([host.panicCall()])])])
		union.func('Concrete', [
			host.typeSwitch(host.value(pointerTo(circle)), [host.defaultClause([host.panicCall()])]),
		])
		union.func('Error', [host.typeSwitch(host.value(ERROR_TYPE), [host.defaultClause([host.panicCall()])])])

		assert.deepEqual(await messages(host), [])
	})

	it('should drop arms that do not resolve and nil arms', async () => {
		const { host, result, success, union } = unionFixture()
		union.func('Partial', [
			host.typeSwitch(host.value(result), [
				host.caseClause([host.arm(pointerTo(success))]),
				host.caseClause([
					{ kind: 'typeName', name: 'Missing', position: host.position(), qualifier: null },
				]),
				{ body: [], position: host.position(), types: [{ kind: 'nil', position: host.position() }] },
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Result: union.*Error',
		])
	})

	it('should not count a bare arm for a pointer-qualified variant', async () => {
		const { error, host, result, success, union } = unionFixture()
		union.func('Values', [
			host.typeSwitch(host.value(result), [
				host.caseClause([host.arm(success), host.arm(pointerTo(error))]),
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Result: union.*Success',
		])
	})

	it('should not count same-named types from another module', async () => {
		const { host, result, success, union } = unionFixture()
		host.addModule('mirror').pointerVariant('Error', 'isResult')
		union.func('Mixed', [
			host.typeSwitch(host.value(result), [
				host.caseClause([host.arm(pointerTo(success)), host.arm(pointerTo(namedType('mirror', 'Error')))]),
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Result: union.*Error',
		])
	})

	it('should check switches nested in case arms', async () => {
		const { circle, host, result, shape, success, union } = unionFixture()
		const inner = host.typeSwitch(host.value(shape), [host.caseClause([host.arm(pointerTo(circle))])])
		union.func('Nested', [
			host.typeSwitch(host.value(result), [
				host.caseClause([host.arm(pointerTo(success))], [inner]),
				host.defaultClause([host.returns(host.value(basicType('string')))]),
			]),
		])

		assert.deepEqual(await messages(host), [
			'missing cases in type switch on Shape: union.*Rectangle, union.*Triangle',
		])
	})
})

describe('analyze', () => {
	function consumerOf(host: FakeHost, union: FakeModule, path = 'consumer'): FakeModule {
		return host.addModule(path, [union.unit.path])
	}

	it('should make facts visible to importing modules', async () => {
		const host = new FakeHost()
		const consumer = host.addModule('consumer', ['example.com/union'])
		const { circle, shape } = unionFixture(host, 'example.com/union')
		consumer.func('DrawShape', [
			host.typeSwitch(host.value(shape), [host.caseClause([host.arm(pointerTo(circle))])]),
		])

		const result = await analyze(host)
		assert.deepEqual(
			result.modules.map((m) => m.module.path),
			['example.com/union', 'consumer']
		)
		assert.deepEqual(
			result.context.getDiagnostics().map((d) => d.message),
			['missing cases in type switch on Shape: union.*Rectangle, union.*Triangle']
		)
		assert.equal(result.succeeded, false)
		assert.equal(result.facts.count(), 2)
	})

	it('should report exported facts per module', async () => {
		const { host } = unionFixture()
		const result = await analyze(host)
		const [report] = result.modules
		assert.deepEqual(
			report?.facts.map((f) => `${f.contractName} ${f.variants.join(' ')}`),
			['Result *Error *Success', 'Shape *Circle *Rectangle *Triangle']
		)
		assert.equal(result.succeeded, true)
	})

	it('should return diagnostics in dependency order, then source order', async () => {
		const { circle, host, result, shape, success, union } = unionFixture()
		const consumer = consumerOf(host, union)
		consumer.func('First', [
			host.typeSwitch(host.value(result), [host.caseClause([host.arm(pointerTo(success))])]),
		])
		union.func('Second', [
			host.typeSwitch(host.value(shape), [host.caseClause([host.arm(pointerTo(circle))])]),
		])

		const analysis = await analyze(host)
		assert.deepEqual(
			analysis.context.getDiagnostics().map((d) => d.message),
			[
				'missing cases in type switch on Shape: union.*Rectangle, union.*Triangle',
				'missing cases in type switch on Result: union.*Error',
			]
		)
	})

	it('should report into a supplied context', async () => {
		const { host, result, union } = unionFixture()
		union.func('Empty', [host.typeSwitch(host.value(result), [])])
		const context = new AnalysisContext()

		const analysis = await analyze(host, { context })
		assert.equal(analysis.context, context)
		assert.equal(context.getErrorCount(), 1)
	})

	it('should reject import cycles', async () => {
		const host = new FakeHost()
		host.addModule('a', ['b'])
		host.addModule('b', ['a'])
		await assert.rejects(analyze(host), ModuleGraphError)
	})

	it('should abort on a module listed twice', async () => {
		const host = new FakeHost()
		host.addModule('union')
		host.addModule('union')
		await assert.rejects(analyze(host), InvariantError)
	})
})
