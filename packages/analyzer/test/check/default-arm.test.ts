import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { basicType, classifyDefaultArm, isSafetyGuard, pointerTo } from '../../src/index.ts'
import { ERROR_TYPE, FakeHost, method } from '../support/fake-host.ts'

function setup() {
	const host = new FakeHost()
	const errs = host.addModule('errs')
	const valueError = errs.concrete('CodeError', { value: [method('Error', 0, 1)] })
	const pointerError = errs.concrete('PathError', { pointer: [method('Error', 0, 1)] })
	return { host, pointerError, valueError }
}

describe('classifyDefaultArm', () => {
	it('should treat an empty arm as intentional', () => {
		const { host } = setup()
		assert.equal(classifyDefaultArm(host.defaultClause([]), host), 'intentional')
	})

	it('should treat a final panic as a safety guard', () => {
		const { host } = setup()
		assert.equal(classifyDefaultArm(host.defaultClause([host.panicCall()]), host), 'safety-guard')
	})

	it('should ignore statements before the final one', () => {
		const { host } = setup()
		const arm = host.defaultClause([host.call('logUnexpected'), host.call('flush'), host.panicCall()])
		assert.equal(classifyDefaultArm(arm, host), 'safety-guard')
	})

	it('should treat a panic followed by another statement as intentional', () => {
		const { host } = setup()
		const arm = host.defaultClause([host.panicCall(), host.returns(host.value(basicType('string')))])
		assert.equal(classifyDefaultArm(arm, host), 'intentional')
	})

	it('should treat a call to anything but the abort primitive as intentional', () => {
		const { host } = setup()
		assert.equal(classifyDefaultArm(host.defaultClause([host.call('cleanup')]), host), 'intentional')
	})

	it('should treat a return of only nil literals as intentional', () => {
		const { host } = setup()
		const arm = host.defaultClause([host.returns(host.nil(), host.nil())])
		assert.equal(classifyDefaultArm(arm, host), 'intentional')
	})

	it('should treat a bare return as intentional', () => {
		const { host } = setup()
		assert.equal(classifyDefaultArm(host.defaultClause([host.returns()]), host), 'intentional')
	})

	it('should treat a return of a plain value as intentional', () => {
		const { host } = setup()
		const arm = host.defaultClause([host.returns(host.value(basicType('float64')))])
		assert.equal(classifyDefaultArm(arm, host), 'intentional')
	})

	it('should treat a return with an error value as a safety guard', () => {
		const { host } = setup()
		const arm = host.defaultClause([
			host.returns(host.value(basicType('int')), host.value(ERROR_TYPE, 'err')),
		])
		assert.equal(classifyDefaultArm(arm, host), 'safety-guard')
	})

	it('should skip nil literals when looking for an error result', () => {
		const { host, valueError } = setup()
		const arm = host.defaultClause([host.returns(host.nil(), host.value(valueError))])
		assert.equal(classifyDefaultArm(arm, host), 'safety-guard')
	})

	it('should accept a type whose pointer form implements the error capability', () => {
		const { host, pointerError } = setup()
		const direct = host.defaultClause([host.returns(host.value(pointerTo(pointerError)))])
		const bare = host.defaultClause([host.returns(host.value(pointerError))])
		assert.equal(classifyDefaultArm(direct, host), 'safety-guard')
		assert.equal(classifyDefaultArm(bare, host), 'safety-guard')
	})

	it('should skip results whose type does not resolve', () => {
		const { host } = setup()
		const arm = host.defaultClause([host.returns(host.opaque(), host.nil())])
		assert.equal(classifyDefaultArm(arm, host), 'intentional')
	})

	describe('sole-statement rule', () => {
		it('should accept an arm that is only a panic', () => {
			const { host } = setup()
			const arm = host.defaultClause([host.panicCall()])
			assert.equal(classifyDefaultArm(arm, host, 'sole-statement'), 'safety-guard')
		})

		it('should treat preceding statements as intentional', () => {
			const { host } = setup()
			const arm = host.defaultClause([host.call('logUnexpected'), host.panicCall()])
			assert.equal(classifyDefaultArm(arm, host, 'sole-statement'), 'intentional')
			assert.equal(classifyDefaultArm(arm, host, 'last-statement'), 'safety-guard')
		})
	})
})

describe('isSafetyGuard', () => {
	it('should not treat a type switch as a guard', () => {
		const { host } = setup()
		const nested = host.typeSwitch(host.value(ERROR_TYPE), [host.defaultClause([host.panicCall()])])
		assert.equal(isSafetyGuard(nested, host), false)
	})
})
