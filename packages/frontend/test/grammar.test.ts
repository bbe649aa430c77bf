import assert from 'node:assert'
import { describe, it } from 'node:test'
import { AnalysisContext, type Expression, type Statement } from '@sealcheck/analyzer'
import type { SealDeclaration, SourceFile } from '../src/core/source.ts'
import { parseSource } from '../src/parse/parser.ts'

function parse(source: string): SourceFile {
	const result = parseSource(source, 'test.seal')
	assert.ok(result.file, 'expected the source to parse')
	return result.file
}

function declaration(file: SourceFile, index: number): SealDeclaration {
	const found = file.declarations[index]
	assert.ok(found, `expected a declaration at index ${index}`)
	return found
}

function functionBody(file: SourceFile, name: string): readonly Statement[] {
	const found = file.declarations.find((d) => d.kind === 'function' && d.name === name)
	if (found?.kind !== 'function') assert.fail(`no function ${name}`)
	return found.body
}

function initializer(file: SourceFile, name: string): Expression {
	const found = file.declarations.find((d) => d.kind === 'variable' && d.name === name)
	if (found?.kind !== 'variable' || found.value === null) assert.fail(`no initialized var ${name}`)
	return found.value
}

describe('parseSource', () => {
	describe('package clause and imports', () => {
		it('should read the package name', () => {
			assert.strictEqual(parse('package shapes\n').packageName, 'shapes')
		})

		it('should read single, grouped and aliased imports', () => {
			const file = parse('package app\n\nimport (\n\t"errors"\n\tu "lib/union"\n)\nimport "fmt"\n')
			assert.deepStrictEqual(
				file.imports.map(({ alias, path }) => ({ alias, path })),
				[
					{ alias: null, path: 'errors' },
					{ alias: 'u', path: 'lib/union' },
					{ alias: null, path: 'fmt' },
				]
			)
		})

		it('should treat comments as whitespace', () => {
			const file = parse('// leading\npackage p /* inline */\n// trailing\n')
			assert.strictEqual(file.packageName, 'p')
			assert.deepStrictEqual(file.packagePosition, { column: 1, filename: 'test.seal', line: 2 })
		})
	})

	describe('type declarations', () => {
		it('should lower interface methods to signatures', () => {
			const file = parse(
				'package p\ntype Shape interface {\n\tisShape()\n\tArea() float64\n\tSplit(n int) (Shape, error)\n}\n'
			)
			const shape = declaration(file, 0)
			assert.strictEqual(shape.kind, 'type')
			if (shape.kind !== 'type') return
			assert.strictEqual(shape.abstract, true)
			assert.deepStrictEqual(shape.methods, [
				{ exported: false, name: 'isShape', params: 0, results: 0 },
				{ exported: true, name: 'Area', params: 0, results: 1 },
				{ exported: true, name: 'Split', params: 1, results: 2 },
			])
		})

		it('should treat struct and defined types as concrete', () => {
			const file = parse(
				'package p\ntype Rectangle struct {\n\tWidth, Height float64\n}\ntype Celsius float64\n'
			)
			const rectangle = declaration(file, 0)
			const celsius = declaration(file, 1)
			assert.ok(rectangle.kind === 'type' && celsius.kind === 'type')
			assert.strictEqual(rectangle.abstract, false)
			assert.deepStrictEqual(rectangle.methods, [])
			assert.deepStrictEqual(
				rectangle.body.kind === 'struct' ? rectangle.body.fields.map((f) => f.name) : [],
				['Width', 'Height']
			)
			assert.strictEqual(celsius.body.kind, 'defined')
		})

		it('should accept grouped type declarations', () => {
			const file = parse('package p\ntype (\n\tA int\n\tB struct {}\n)\n')
			assert.deepStrictEqual(
				file.declarations.map((d) => d.name),
				['A', 'B']
			)
		})
	})

	describe('functions', () => {
		it('should read value and pointer receivers', () => {
			const file = parse('package p\nfunc (c *Circle) isShape() {}\nfunc (Word) isToken() {}\n')
			const [circle, word] = file.declarations
			assert.ok(circle?.kind === 'function' && word?.kind === 'function')
			assert.strictEqual(circle.receiver?.name, 'c')
			assert.strictEqual(circle.receiver?.type.kind, 'pointerType')
			assert.strictEqual(word.receiver?.name, null)
			assert.strictEqual(word.receiver?.type.kind, 'typeName')
		})

		it('should expand grouped parameters and read result lists', () => {
			const file = parse('package p\nfunc Div(a, b int, label string) (int, error) { return a, nil }\n')
			const div = declaration(file, 0)
			assert.ok(div.kind === 'function')
			assert.deepStrictEqual(
				div.params.map((p) => p.name),
				['a', 'b', 'label']
			)
			assert.strictEqual(div.results.length, 2)
		})
	})

	describe('type switches', () => {
		const source = [
			'package p',
			'func F(s Shape) string {',
			'\tswitch v := s.(type) {',
			'\tcase *Circle, Square:',
			'\t\treturn "a"',
			'\tcase nil:',
			'\t\treturn "nil"',
			'\tdefault:',
			'\t\tpanic("x")',
			'\t}',
			'\treturn ""',
			'}',
		].join('\n')

		it('should read the binding, subject and clauses', () => {
			const [statement] = functionBody(parse(source), 'F')
			if (statement?.kind !== 'typeSwitch') assert.fail('expected a type switch')
			assert.strictEqual(statement.binding, 'v')
			assert.deepStrictEqual(statement.subject, {
				kind: 'identifier',
				name: 's',
				position: { column: 14, filename: 'test.seal', line: 3 },
			})
			assert.deepStrictEqual(
				statement.clauses.map((c) => c.types?.map((t) => t.kind) ?? null),
				[['pointerType', 'typeName'], ['nil'], null]
			)
			assert.strictEqual(statement.clauses[2]?.body[0]?.kind, 'expression')
		})

		it('should place the switch at its keyword', () => {
			const [statement] = functionBody(parse(source), 'F')
			assert.deepStrictEqual(statement?.position, { column: 2, filename: 'test.seal', line: 3 })
		})

		it('should accept a switch without binding', () => {
			const file = parse('package p\nfunc F(s Shape) {\n\tswitch s.(type) {\n\t}\n}\n')
			const [statement] = functionBody(file, 'F')
			if (statement?.kind !== 'typeSwitch') assert.fail('expected a type switch')
			assert.strictEqual(statement.binding, null)
			assert.deepStrictEqual(statement.clauses, [])
		})
	})

	describe('expressions', () => {
		it('should bind multiplication tighter than addition', () => {
			const expression = initializer(parse('package p\nvar x = 1 + 2 * 3\n'), 'x')
			if (expression.kind !== 'binary') assert.fail('expected a binary expression')
			assert.strictEqual(expression.operator, '+')
			assert.strictEqual(expression.right.kind, 'binary')
		})

		it('should read composite literals with keyed and positional fields', () => {
			const expression = initializer(parse('package p\nvar b = &Box{Value: 1, 2}\n'), 'b')
			if (expression.kind !== 'unary' || expression.operand.kind !== 'composite') {
				assert.fail('expected &Box{...}')
			}
			assert.strictEqual(expression.operator, '&')
			assert.deepStrictEqual(
				expression.operand.fields.map((f) => f.name),
				['Value', null]
			)
		})

		it('should read selectors and calls on qualified names', () => {
			const expression = initializer(parse('package p\nvar e = fmt.Errorf("bad %d", n)\n'), 'e')
			if (expression.kind !== 'call' || expression.callee.kind !== 'selector') {
				assert.fail('expected fmt.Errorf(...)')
			}
			assert.strictEqual(expression.callee.name, 'Errorf')
			assert.strictEqual(expression.args.length, 2)
		})

		it('should unescape string literals', () => {
			const expression = initializer(parse(String.raw`package p
var s = "say \"hi\"\n"
`), 's')
			assert.strictEqual(expression.kind === 'literal' ? expression.value : null, 'say "hi"\n')
		})

		it('should not take keywords as identifiers', () => {
			assert.strictEqual(parseSource('package p\nvar types = 1\n', 'test.seal').succeeded, true)
			assert.strictEqual(parseSource('package p\nvar type = 1\n', 'test.seal').succeeded, false)
		})
	})

	describe('syntax errors', () => {
		it('should report SCPARSE001 at the failure position', () => {
			const context = new AnalysisContext()
			const result = parseSource('package p\nfunc F() {\n', 'bad.seal', context)

			assert.strictEqual(result.succeeded, false)
			assert.strictEqual(result.file, undefined)
			const [diagnostic] = context.getDiagnostics()
			assert.strictEqual(diagnostic?.def.code, 'SCPARSE001')
			assert.deepStrictEqual(diagnostic.position, { column: 1, filename: 'bad.seal', line: 3 })
			assert.ok(diagnostic.message.startsWith('syntax error: expected '))
		})

		it('should not need a context', () => {
			assert.deepStrictEqual(parseSource('package', 'bad.seal'), { succeeded: false })
		})
	})
})
