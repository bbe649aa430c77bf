import type {
	CaseType,
	Expression,
	Parameter,
	SourcePosition,
	Statement,
	TypeCaseClause,
	TypeNode,
} from '@sealcheck/analyzer'
import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'
import {
	type FieldSpec,
	type ImportSpec,
	type InterfaceMethod,
	isExportedName,
	type SealDeclaration,
	type SealTypeDeclaration,
	type SourceFile,
	type TypeBody,
} from '../core/source.ts'

/**
 * Seal Grammar Source
 *
 * A package clause, imports, then top-level `type`, `func` and `var`
 * declarations. Statements are separated by whitespace; `;` is optional.
 *
 * Comment syntax (treated as whitespace):
 *   `// to end of line` and `/* block *\/`
 */
const grammarSource = String.raw`
Seal {
  SourceFile = PackageClause ImportDecl* TopLevelDecl*

  PackageClause = kwPackage ident

  ImportDecl = kwImport "(" ImportSpec* ")"  -- group
             | kwImport ImportSpec           -- single
  ImportSpec = ident? stringLit

  // Declarations
  TopLevelDecl = TypeDecl | FuncDecl | VarDecl

  TypeDecl = kwType "(" TypeSpec* ")"  -- group
           | kwType TypeSpec           -- single
  TypeSpec = ident TypeBody
  TypeBody = kwInterface "{" MethodSpec* "}"  -- interface
           | kwStruct "{" FieldDecl* "}"      -- struct
           | Type                             -- defined
  MethodSpec = ident Parameters MethodResults?
  MethodResults = "(" ListOf<ParamGroup, ","> ","? ")"  -- list
                | Type ~"("                             -- single
  FieldDecl = NonemptyListOf<ident, ","> Type

  FuncDecl = kwFunc Receiver? ident Parameters Results? Block
  Receiver = "(" ident Type ")"  -- named
           | "(" Type ")"        -- anonymous
  Parameters = "(" ListOf<ParamGroup, ","> ","? ")"
  ParamGroup = NonemptyListOf<ident, ","> Type  -- named
             | Type                             -- anonymous
  Results = "(" ListOf<ParamGroup, ","> ","? ")"  -- list
          | Type                                  -- single

  VarDecl = kwVar ident Type? VarInit?
  VarInit = "=" Expr

  // Types
  Type = "*" Type  -- pointer
       | TypeName
  TypeName = ident "." ident  -- qualified
           | ident            -- plain

  // Statements
  Block = "{" Stmt* "}"
  Stmt = SimpleStmt ";"?
  SimpleStmt = TypeSwitchStmt | ReturnStmt | DefineStmt | Block | ExprStmt

  TypeSwitchStmt = kwSwitch SwitchGuard "{" TypeCaseClause* "}"
  SwitchGuard = ident ":=" PrimaryExpr "." "(" kwType ")"  -- bound
              | PrimaryExpr "." "(" kwType ")"             -- plain
  TypeCaseClause = kwCase NonemptyListOf<CaseType, ","> ":" Stmt*  -- case
                 | kwDefault ":" Stmt*                             -- default
  CaseType = kwNil  -- nil
           | Type   -- type

  ReturnStmt = kwReturn ListOf<Expr, ",">
  DefineStmt = ident ":=" Expr
  ExprStmt = Expr

  // Expressions, lowest precedence first
  Expr = OrExpr
  OrExpr = OrExpr "||" AndExpr  -- or
         | AndExpr
  AndExpr = AndExpr "&&" CmpExpr  -- and
          | CmpExpr
  CmpExpr = CmpExpr cmpOp AddExpr  -- cmp
          | AddExpr
  AddExpr = AddExpr addOp MulExpr  -- add
          | MulExpr
  MulExpr = MulExpr mulOp UnaryExpr  -- mul
          | UnaryExpr
  UnaryExpr = unaryOp UnaryExpr  -- op
            | PrimaryExpr
  PrimaryExpr = PrimaryExpr "." ident  -- selector
              | PrimaryExpr Arguments  -- call
              | Operand
  Arguments = "(" ListOf<Expr, ","> ","? ")"
  Operand = "(" Expr ")"  -- paren
          | CompositeLit
          | Literal
          | kwNil         -- nil
          | ident         -- name
  CompositeLit = TypeName "{" ListOf<Element, ","> ","? "}"
  Element = ident ":" Expr  -- keyed
          | Expr            -- positional
  Literal = stringLit | floatLit | intLit | kwTrue | kwFalse

  // Keywords
  keyword = kwCase | kwDefault | kwFalse | kwFunc | kwImport | kwInterface | kwNil
          | kwPackage | kwReturn | kwStruct | kwSwitch | kwTrue | kwType | kwVar
  kwCase = "case" ~identPart
  kwDefault = "default" ~identPart
  kwFalse = "false" ~identPart
  kwFunc = "func" ~identPart
  kwImport = "import" ~identPart
  kwInterface = "interface" ~identPart
  kwNil = "nil" ~identPart
  kwPackage = "package" ~identPart
  kwReturn = "return" ~identPart
  kwStruct = "struct" ~identPart
  kwSwitch = "switch" ~identPart
  kwTrue = "true" ~identPart
  kwType = "type" ~identPart
  kwVar = "var" ~identPart

  // Lexical token rules
  ident (an identifier) = ~keyword identStart identPart*
  identStart = letter | "_"
  identPart = alnum | "_"
  stringLit (a string) = "\"" stringChar* "\""
  stringChar = "\\" any                     -- escaped
             | ~("\"" | "\\" | "\n") any  -- plain
  floatLit (a number) = digit+ "." digit+
  intLit (a number) = digit+
  cmpOp = "==" | "!=" | "<=" | ">=" | "<" | ">"
  addOp = "+" | "-"
  mulOp = "*" | "/" | "%"
  unaryOp = "&" | "*" | "-" | "!"

  // Comments treated as whitespace
  space += comment
  comment = "//" (~"\n" any)*       -- line
          | "/*" (~"*/" any)* "*/"  -- block
}
`

/**
 * The compiled Seal grammar.
 */
export const SealGrammar = ohm.grammar(grammarSource)

const ESCAPES: Readonly<Record<string, string>> = {
	'"': '"',
	'\\': '\\',
	n: '\n',
	r: '\r',
	t: '\t',
}

function unquote(literal: string): string {
	return literal.slice(1, -1).replace(/\\(.)/g, (_, c: string) => ESCAPES[c] ?? c)
}

type UnaryOperator = '&' | '*' | '-' | '!'

function unaryOperator(text: string): UnaryOperator {
	switch (text) {
		case '&':
		case '*':
		case '-':
		case '!':
			return text
		default:
			throw new Error(`unexpected unary operator "${text}"`)
	}
}

/**
 * Maps character offsets of one input to line and column.
 */
export class LineIndex {
	private source: string | null = null
	private starts: number[] = []

	at(source: string, offset: number): { line: number; column: number } {
		if (source !== this.source) {
			this.source = source
			this.starts = [0]
			for (let i = 0; i < source.length; i++) {
				if (source[i] === '\n') this.starts.push(i + 1)
			}
		}

		let low = 0
		let high = this.starts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((this.starts[mid] ?? 0) <= offset) low = mid
			else high = mid - 1
		}
		return { column: offset - (this.starts[low] ?? 0) + 1, line: low + 1 }
	}
}

/**
 * Create semantics for the Seal grammar. Positions are reported against
 * `filename`.
 */
export function createSemantics(filename: string): Semantics {
	const semantics = SealGrammar.createSemantics()
	const lines = new LineIndex()

	function pos(node: Node): SourcePosition {
		const { line, column } = lines.at(node.source.sourceString, node.source.startIdx)
		return { column, filename, line }
	}

	function binary(node: Node, left: Node, op: Node, right: Node): Expression {
		return {
			kind: 'binary',
			left: left['toExpr'](),
			operator: op.sourceString,
			position: pos(node),
			right: right['toExpr'](),
		}
	}

	function statements(list: Node): Statement[] {
		return list.children.map((s: Node) => s['toStmt']())
	}

	function paramList(list: Node): Parameter[] {
		return list.asIteration().children.flatMap((g: Node) => g['toParamGroup']())
	}

	// ---------------------------------------------------------------------------
	// Types
	// ---------------------------------------------------------------------------

	semantics.addOperation<TypeNode>('toType', {
		Type_pointer(_star: Node, elem: Node) {
			return { elem: elem['toType'](), kind: 'pointerType', position: pos(this) }
		},
		TypeName_plain(name: Node) {
			return { kind: 'typeName', name: name.sourceString, position: pos(this), qualifier: null }
		},
		TypeName_qualified(qualifier: Node, _dot: Node, name: Node) {
			return {
				kind: 'typeName',
				name: name.sourceString,
				position: pos(this),
				qualifier: qualifier.sourceString,
			}
		},
	})

	semantics.addOperation<Parameter[]>('toParamGroup', {
		ParamGroup_anonymous(type: Node) {
			return [{ name: null, type: type['toType']() }]
		},
		ParamGroup_named(names: Node, type: Node) {
			return names
				.asIteration()
				.children.map((n: Node) => ({ name: n.sourceString, type: type['toType']() }))
		},
	})

	semantics.addOperation<Parameter[]>('toParams', {
		Parameters(_open: Node, list: Node, _comma: Node, _close: Node) {
			return paramList(list)
		},
	})

	semantics.addOperation<Parameter>('toReceiver', {
		Receiver_anonymous(_open: Node, type: Node, _close: Node) {
			return { name: null, type: type['toType']() }
		},
		Receiver_named(_open: Node, name: Node, type: Node, _close: Node) {
			return { name: name.sourceString, type: type['toType']() }
		},
	})

	semantics.addOperation<TypeNode[]>('toResults', {
		MethodResults_list(_open: Node, list: Node, _comma: Node, _close: Node) {
			return paramList(list).map((p) => p.type)
		},
		MethodResults_single(type: Node) {
			return [type['toType']()]
		},
		Results_list(_open: Node, list: Node, _comma: Node, _close: Node) {
			return paramList(list).map((p) => p.type)
		},
		Results_single(type: Node) {
			return [type['toType']()]
		},
	})

	// ---------------------------------------------------------------------------
	// Expressions
	// ---------------------------------------------------------------------------

	semantics.addOperation<Expression[]>('toArgs', {
		Arguments(_open: Node, list: Node, _comma: Node, _close: Node) {
			return list.asIteration().children.map((e: Node) => e['toExpr']())
		},
	})

	semantics.addOperation<{ name: string | null; value: Expression }>('toElement', {
		Element_keyed(name: Node, _colon: Node, value: Node) {
			return { name: name.sourceString, value: value['toExpr']() }
		},
		Element_positional(value: Node) {
			return { name: null, value: value['toExpr']() }
		},
	})

	semantics.addOperation<Expression>('toExpr', {
		AddExpr_add(left: Node, op: Node, right: Node) {
			return binary(this, left, op, right)
		},
		AndExpr_and(left: Node, op: Node, right: Node) {
			return binary(this, left, op, right)
		},
		CmpExpr_cmp(left: Node, op: Node, right: Node) {
			return binary(this, left, op, right)
		},
		CompositeLit(type: Node, _open: Node, elements: Node, _comma: Node, _close: Node) {
			return {
				fields: elements.asIteration().children.map((e: Node) => e['toElement']()),
				kind: 'composite',
				position: pos(this),
				type: type['toType'](),
			}
		},
		floatLit(_whole: Node, _dot: Node, _fraction: Node) {
			return { kind: 'literal', position: pos(this), type: 'float', value: this.sourceString }
		},
		intLit(_digits: Node) {
			return { kind: 'literal', position: pos(this), type: 'int', value: this.sourceString }
		},
		kwFalse(_keyword: Node) {
			return { kind: 'literal', position: pos(this), type: 'bool', value: 'false' }
		},
		kwTrue(_keyword: Node) {
			return { kind: 'literal', position: pos(this), type: 'bool', value: 'true' }
		},
		MulExpr_mul(left: Node, op: Node, right: Node) {
			return binary(this, left, op, right)
		},
		Operand_name(name: Node) {
			return { kind: 'identifier', name: name.sourceString, position: pos(this) }
		},
		Operand_nil(_keyword: Node) {
			return { kind: 'nil', position: pos(this) }
		},
		Operand_paren(_open: Node, inner: Node, _close: Node) {
			return { inner: inner['toExpr'](), kind: 'paren', position: pos(this) }
		},
		OrExpr_or(left: Node, op: Node, right: Node) {
			return binary(this, left, op, right)
		},
		PrimaryExpr_call(callee: Node, args: Node) {
			return {
				args: args['toArgs'](),
				callee: callee['toExpr'](),
				kind: 'call',
				position: pos(this),
			}
		},
		PrimaryExpr_selector(object: Node, _dot: Node, name: Node) {
			return {
				kind: 'selector',
				name: name.sourceString,
				object: object['toExpr'](),
				position: pos(this),
			}
		},
		stringLit(_open: Node, _chars: Node, _close: Node) {
			return {
				kind: 'literal',
				position: pos(this),
				type: 'string',
				value: unquote(this.sourceString),
			}
		},
		UnaryExpr_op(op: Node, operand: Node) {
			return {
				kind: 'unary',
				operand: operand['toExpr'](),
				operator: unaryOperator(op.sourceString),
				position: pos(this),
			}
		},
		VarInit(_equals: Node, value: Node) {
			return value['toExpr']()
		},
	})

	// ---------------------------------------------------------------------------
	// Statements
	// ---------------------------------------------------------------------------

	semantics.addOperation<CaseType>('toCaseType', {
		CaseType_nil(_keyword: Node) {
			return { kind: 'nil', position: pos(this) }
		},
		CaseType_type(type: Node) {
			return type['toType']()
		},
	})

	semantics.addOperation<TypeCaseClause>('toClause', {
		TypeCaseClause_case(_keyword: Node, types: Node, _colon: Node, body: Node) {
			return {
				body: statements(body),
				position: pos(this),
				types: types.asIteration().children.map((t: Node) => t['toCaseType']()),
			}
		},
		TypeCaseClause_default(_keyword: Node, _colon: Node, body: Node) {
			return { body: statements(body), position: pos(this), types: null }
		},
	})

	semantics.addOperation<{ binding: string | null; subject: Expression }>('toGuard', {
		SwitchGuard_bound(
			name: Node,
			_define: Node,
			subject: Node,
			_dot: Node,
			_open: Node,
			_type: Node,
			_close: Node
		) {
			return { binding: name.sourceString, subject: subject['toExpr']() }
		},
		SwitchGuard_plain(subject: Node, _dot: Node, _open: Node, _type: Node, _close: Node) {
			return { binding: null, subject: subject['toExpr']() }
		},
	})

	semantics.addOperation<Statement[]>('toBlock', {
		Block(_open: Node, body: Node, _close: Node) {
			return statements(body)
		},
	})

	semantics.addOperation<Statement>('toStmt', {
		Block(_open: Node, body: Node, _close: Node) {
			return { body: statements(body), kind: 'block', position: pos(this) }
		},
		DefineStmt(name: Node, _define: Node, value: Node) {
			return {
				kind: 'define',
				name: name.sourceString,
				position: pos(this),
				value: value['toExpr'](),
			}
		},
		ExprStmt(expression: Node) {
			return { expression: expression['toExpr'](), kind: 'expression', position: pos(this) }
		},
		ReturnStmt(_keyword: Node, results: Node) {
			return {
				kind: 'return',
				position: pos(this),
				results: results.asIteration().children.map((e: Node) => e['toExpr']()),
			}
		},
		Stmt(statement: Node, _semicolon: Node) {
			return statement['toStmt']()
		},
		TypeSwitchStmt(_keyword: Node, guard: Node, _open: Node, clauses: Node, _close: Node) {
			const { binding, subject } = guard['toGuard']()
			return {
				binding,
				clauses: clauses.children.map((c: Node) => c['toClause']()),
				kind: 'typeSwitch',
				position: pos(this),
				subject,
			}
		},
	})

	// ---------------------------------------------------------------------------
	// Declarations
	// ---------------------------------------------------------------------------

	semantics.addOperation<InterfaceMethod>('toMethod', {
		MethodSpec(name: Node, params: Node, results: Node) {
			return {
				name: name.sourceString,
				params: params['toParams'](),
				position: pos(this),
				results: results.children[0]?.['toResults']() ?? [],
			}
		},
	})

	semantics.addOperation<FieldSpec[]>('toFields', {
		FieldDecl(names: Node, type: Node) {
			return names
				.asIteration()
				.children.map((n: Node) => ({ name: n.sourceString, type: type['toType']() }))
		},
	})

	semantics.addOperation<TypeBody>('toTypeBody', {
		TypeBody_defined(type: Node) {
			return { kind: 'defined', underlying: type['toType']() }
		},
		TypeBody_interface(_keyword: Node, _open: Node, methods: Node, _close: Node) {
			return { kind: 'interface', methods: methods.children.map((m: Node) => m['toMethod']()) }
		},
		TypeBody_struct(_keyword: Node, _open: Node, fields: Node, _close: Node) {
			return { fields: fields.children.flatMap((f: Node) => f['toFields']()), kind: 'struct' }
		},
	})

	semantics.addOperation<SealTypeDeclaration>('toTypeDecl', {
		TypeSpec(name: Node, typeBody: Node) {
			const body: TypeBody = typeBody['toTypeBody']()
			const methods =
				body.kind === 'interface'
					? body.methods.map((m) => ({
							exported: isExportedName(m.name),
							name: m.name,
							params: m.params.length,
							results: m.results.length,
						}))
					: []
			return {
				abstract: body.kind === 'interface',
				body,
				kind: 'type',
				methods,
				name: name.sourceString,
				position: pos(this),
			}
		},
	})

	semantics.addOperation<SealDeclaration[]>('toDecls', {
		FuncDecl(
			_keyword: Node,
			receiver: Node,
			name: Node,
			params: Node,
			results: Node,
			body: Node
		) {
			return [
				{
					body: body['toBlock'](),
					kind: 'function',
					name: name.sourceString,
					params: params['toParams'](),
					position: pos(this),
					receiver: receiver.children[0]?.['toReceiver']() ?? null,
					results: results.children[0]?.['toResults']() ?? [],
				},
			]
		},
		TypeDecl_group(_keyword: Node, _open: Node, specs: Node, _close: Node) {
			return specs.children.map((s: Node) => s['toTypeDecl']())
		},
		TypeDecl_single(_keyword: Node, spec: Node) {
			return [spec['toTypeDecl']()]
		},
		VarDecl(_keyword: Node, name: Node, type: Node, init: Node) {
			return [
				{
					kind: 'variable',
					name: name.sourceString,
					position: pos(this),
					type: type.children[0]?.['toType']() ?? null,
					value: init.children[0]?.['toExpr']() ?? null,
				},
			]
		},
	})

	semantics.addOperation<ImportSpec>('toImport', {
		ImportSpec(alias: Node, path: Node) {
			return {
				alias: alias.children[0]?.sourceString ?? null,
				path: unquote(path.sourceString),
				position: pos(this),
			}
		},
	})

	semantics.addOperation<ImportSpec[]>('toImports', {
		ImportDecl_group(_keyword: Node, _open: Node, specs: Node, _close: Node) {
			return specs.children.map((s: Node) => s['toImport']())
		},
		ImportDecl_single(_keyword: Node, spec: Node) {
			return [spec['toImport']()]
		},
	})

	semantics.addOperation<SourceFile>('toFile', {
		SourceFile(pkg: Node, imports: Node, declarations: Node) {
			const packageName = pkg.child(1)
			return {
				declarations: declarations.children.flatMap((d: Node) => d['toDecls']()),
				filename,
				imports: imports.children.flatMap((i: Node) => i['toImports']()),
				packageName: packageName.sourceString,
				packagePosition: pos(pkg),
			}
		},
	})

	return semantics
}
