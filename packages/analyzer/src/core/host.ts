/**
 * The host interface: everything the engine needs from the parsing and
 * type-resolution collaborator, plus the syntax tree it walks.
 *
 * The tree is deliberately small. Hosts lower their own syntax into these
 * node shapes and answer type questions about the nodes they handed out;
 * node identity is the lookup key, so hosts must not copy nodes.
 */

/**
 * A position in a source file. Line and column are 1-indexed.
 */
export interface SourcePosition {
	readonly filename: string
	readonly line: number
	readonly column: number
}

// ============================================================================
// Types
// ============================================================================

/**
 * A declared type. `module` is the declaring module's path; the universe
 * (built-in) module is the empty string.
 */
export interface NamedType {
	readonly kind: 'named'
	readonly module: string
	readonly name: string
	/** Interface-like: has no values of its own, only implementations */
	readonly abstract: boolean
}

export interface PointerType {
	readonly kind: 'pointer'
	readonly elem: TypeRef
}

/** Unnamed built-in types: string, int, untyped nil, ... */
export interface BasicType {
	readonly kind: 'basic'
	readonly name: string
}

export type TypeRef = NamedType | PointerType | BasicType

/**
 * A method-set requirement, such as the built-in error capability.
 */
export interface Capability {
	readonly name: string
	readonly methods: readonly CapabilityMethod[]
}

/** A required method; `resultTypes`, when given, must match the method's results. */
export interface CapabilityMethod extends MethodSignature {
	readonly resultTypes?: readonly TypeRef[]
}

/** Parameter and result counts of a method. */
export interface Arity {
	readonly params: number
	readonly results: number
}

// ============================================================================
// Declarations
// ============================================================================

export interface MethodSignature extends Arity {
	readonly name: string
	/** Visible outside the declaring module (host naming convention) */
	readonly exported: boolean
}

export interface TypeDeclaration {
	readonly kind: 'type'
	readonly name: string
	readonly abstract: boolean
	/** Methods declared in the type body; only abstract types have any */
	readonly methods: readonly MethodSignature[]
	readonly position: SourcePosition
}

export interface Parameter {
	readonly name: string | null
	readonly type: TypeNode
}

export interface FunctionDeclaration {
	readonly kind: 'function'
	readonly name: string
	readonly receiver: Parameter | null
	readonly params: readonly Parameter[]
	readonly results: readonly TypeNode[]
	readonly body: readonly Statement[]
	readonly position: SourcePosition
}

export interface VariableDeclaration {
	readonly kind: 'variable'
	readonly name: string
	readonly type: TypeNode | null
	readonly value: Expression | null
	readonly position: SourcePosition
}

export type Declaration = TypeDeclaration | FunctionDeclaration | VariableDeclaration

// ============================================================================
// Type syntax
// ============================================================================

export interface TypeNameNode {
	readonly kind: 'typeName'
	/** Module short name for qualified references (`shapes.Circle`) */
	readonly qualifier: string | null
	readonly name: string
	readonly position: SourcePosition
}

export interface PointerTypeNode {
	readonly kind: 'pointerType'
	readonly elem: TypeNode
	readonly position: SourcePosition
}

export type TypeNode = TypeNameNode | PointerTypeNode

// ============================================================================
// Expressions
// ============================================================================

export interface IdentifierExpression {
	readonly kind: 'identifier'
	readonly name: string
	readonly position: SourcePosition
}

export interface NilExpression {
	readonly kind: 'nil'
	readonly position: SourcePosition
}

export interface LiteralExpression {
	readonly kind: 'literal'
	readonly type: 'string' | 'int' | 'float' | 'bool'
	readonly value: string
	readonly position: SourcePosition
}

export interface CallExpression {
	readonly kind: 'call'
	readonly callee: Expression
	readonly args: readonly Expression[]
	readonly position: SourcePosition
}

export interface SelectorExpression {
	readonly kind: 'selector'
	readonly object: Expression
	readonly name: string
	readonly position: SourcePosition
}

export interface CompositeExpression {
	readonly kind: 'composite'
	readonly type: TypeNameNode
	readonly fields: readonly { readonly name: string | null; readonly value: Expression }[]
	readonly position: SourcePosition
}

export interface UnaryExpression {
	readonly kind: 'unary'
	readonly operator: '&' | '*' | '-' | '!'
	readonly operand: Expression
	readonly position: SourcePosition
}

export interface BinaryExpression {
	readonly kind: 'binary'
	readonly operator: string
	readonly left: Expression
	readonly right: Expression
	readonly position: SourcePosition
}

export interface ParenExpression {
	readonly kind: 'paren'
	readonly inner: Expression
	readonly position: SourcePosition
}

export type Expression =
	| IdentifierExpression
	| NilExpression
	| LiteralExpression
	| CallExpression
	| SelectorExpression
	| CompositeExpression
	| UnaryExpression
	| BinaryExpression
	| ParenExpression

// ============================================================================
// Statements
// ============================================================================

export interface ExpressionStatement {
	readonly kind: 'expression'
	readonly expression: Expression
	readonly position: SourcePosition
}

export interface ReturnStatement {
	readonly kind: 'return'
	readonly results: readonly Expression[]
	readonly position: SourcePosition
}

export interface DefineStatement {
	readonly kind: 'define'
	readonly name: string
	readonly value: Expression
	readonly position: SourcePosition
}

export interface BlockStatement {
	readonly kind: 'block'
	readonly body: readonly Statement[]
	readonly position: SourcePosition
}

/** A type named by a case arm, or `nil`. */
export type CaseType = TypeNode | NilExpression

export interface TypeCaseClause {
	/** `null` marks the default (catch-all) clause */
	readonly types: readonly CaseType[] | null
	readonly body: readonly Statement[]
	readonly position: SourcePosition
}

export interface TypeSwitchStatement {
	readonly kind: 'typeSwitch'
	/** The expression whose dynamic type is being tested */
	readonly subject: Expression
	readonly binding: string | null
	readonly clauses: readonly TypeCaseClause[]
	readonly position: SourcePosition
}

export type Statement =
	| ExpressionStatement
	| ReturnStatement
	| DefineStatement
	| BlockStatement
	| TypeSwitchStatement

// ============================================================================
// Modules and the host
// ============================================================================

/**
 * One compilation module (package).
 */
export interface ModuleUnit {
	/** Unique module path, also the identity used by imports */
	readonly path: string
	/** Short name used to qualify references in diagnostics */
	readonly name: string
	/** Paths of imported workspace modules */
	readonly imports: readonly string[]
}

/**
 * The collaborator that parsed the sources and resolved their types.
 */
export interface AnalysisHost {
	readonly modules: readonly ModuleUnit[]

	/** Module-level declarations in source order. */
	declarations(module: ModuleUnit): Iterable<Declaration>

	/** Static type of an expression or type node, when known. */
	resolveType(node: Expression | TypeNode): TypeRef | undefined

	/** Whether `type`'s method set contains `name` with the given arity. */
	implementsMethod(type: TypeRef, name: string, arity?: Arity): boolean

	errorCapability(): Capability

	/** Whether `type`'s method set covers every method of `capability`. */
	satisfies(type: TypeRef, capability: Capability): boolean

	/** Whether a call invokes the host's panic/abort primitive. */
	isAbortCall(call: CallExpression): boolean

	/** Source text of a file, used only to render diagnostic excerpts. */
	sourceText?(filename: string): string | undefined
}
