import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * Words that can never be identifiers (unless escaped with `&`).
 */
const RESERVED_WORDS = [
	'and',
	'array',
	'as',
	'asm',
	'begin',
	'case',
	'class',
	'const',
	'constructor',
	'destructor',
	'dispinterface',
	'div',
	'do',
	'downto',
	'else',
	'end',
	'except',
	'exports',
	'file',
	'finalization',
	'finally',
	'for',
	'function',
	'goto',
	'if',
	'implementation',
	'in',
	'inherited',
	'initialization',
	'inline',
	'interface',
	'is',
	'label',
	'library',
	'mod',
	'nil',
	'not',
	'object',
	'of',
	'or',
	'packed',
	'procedure',
	'program',
	'property',
	'raise',
	'record',
	'repeat',
	'resourcestring',
	'set',
	'shl',
	'shr',
	'string',
	'then',
	'threadvar',
	'to',
	'try',
	'type',
	'unit',
	'until',
	'uses',
	'var',
	'while',
	'with',
	'xor',
] as const

const reservedWordRule = RESERVED_WORDS.map((word) => `caseInsensitive<"${word}"> ~identPart`).join(
	'\n    | '
)

/**
 * Pascal Outline Grammar
 *
 * Recognizes only the constructs that delimit formatter sections:
 *   unit/program headers, uses clauses, section keywords,
 *   routine declarations and routine bodies (for bare `inherited;`).
 * Everything else is a flat stream of tokens. Input no rule accepts becomes
 * an error node instead of failing the match.
 *
 * Comments and compiler directives are tokens, not whitespace, so they show
 * up as children of the constructs that contain them.
 */
const grammarSource = String.raw`
PascalOutline {
  Source = Item*

  Item
    = UnitHeader
    | UnitRecovery
    | ProgramHeader
    | ProgramRecovery
    | UsesClause
    | UsesRecovery
    | InterfaceTypeHead
    | RoutineDef
    | RoutineDecl
    | sectionKeyword
    | Token

  // Headers
  UnitHeader = kUnit Trivia* moduleName Trivia* ";"
  UnitRecovery = kUnit (~";" ~sectionBoundary Token)* ";"?
  ProgramHeader = kProgram Trivia* moduleName Trivia* ProgramParams? Trivia* ";"
  ProgramParams = "(" ListOf<identifier, ","> ")"
  ProgramRecovery = kProgram (~";" ~sectionBoundary Token)* ";"?

  // Uses clauses
  UsesClause = kUses Trivia* UsesEntry (Trivia* "," Trivia* UsesEntry)* Trivia* ";"
  UsesEntry
    = moduleName kIn stringLiteral  -- located
    | moduleName                    -- plain
  UsesRecovery = kUses (~";" ~sectionBoundary Token)* ";"?

  // "IFoo = interface" starts a type, not the interface section
  InterfaceTypeHead = "=" kPacked? kInterfaceType

  // Routines
  RoutineDef = RoutineDecl DeclPart* Body ";"
  RoutineDecl = kClass? routineKeyword RoutineName DeclArgs? ReturnType? ";"
  RoutineName = identifier GenericArgs? ("." identifier GenericArgs?)*
  GenericArgs = "<" (~">" Token)* ">"
  DeclArgs = "(" ListOf<DeclArg, ";"> ")"
  DeclArg = Attribute* argModifier? Attribute* NonemptyListOf<identifier, ","> ArgType? ArgDefault?
  ArgType = ":" (Group | ~";" ~")" ~"=" Token)+
  ArgDefault = "=" (Group | ~";" ~")" Token)+
  ReturnType = ":" (Group | ~";" Token)+
  Attribute = "[" (~"]" Token)* "]"
  Group
    = "(" (Group | ~")" Token)* ")"  -- parens
    | "[" (Group | ~"]" Token)* "]"  -- brackets

  DeclPart
    = RoutineDef
    | RoutineDecl
    | RecordBlock
    | ~blockStart ~kEnd ~kForward ~sectionBoundary Token
  RecordBlock = kPacked? kRecord (RecordBlock | ~kEnd Token)* kEnd

  Body = (kBegin | kAsm) BodyItem* kEnd
  BodyItem = NestedBlock | InheritedStmt | ~kEnd Token
  NestedBlock = blockStart BodyItem* kEnd
  InheritedStmt = kInherited ";"

  Trivia = pp | comment

  Token
    = pp
    | comment
    | unterminatedComment
    | stringLiteral
    | charCode
    | number
    | word
    | punct
    | errorChar

  // Lexical rules
  sectionKeyword = kInterface | kImplementation | kInitialization | kFinalization
  sectionBoundary = sectionKeyword | kBegin | kUses
  blockStart = kBegin | kCase | kTry | kAsm
  routineKeyword = kProcedure | kFunction | kConstructor | kDestructor | kOperator
  argModifier = kConst | kVar | kOut

  moduleName = ident ("." ident)*
  identifier = ident
  ident
    = "&" identStart identPart*  -- escaped
    | ~reservedWord identStart identPart*  -- plain
  identStart = letter | "_"
  identPart = alnum | "_"
  word = "&"? identStart identPart*

  pp
    = "{$" (~"}" any)* "}"
    | "(*$" (~"*)" any)* "*)"
  comment
    = "{" (~"}" any)* "}"       -- brace
    | "(*" (~"*)" any)* "*)"    -- parenStar
    | "//" (~lineBreak any)*    -- line
  unterminatedComment
    = "{" (~"}" any)* end
    | "(*" (~"*)" any)* end
  stringLiteral = "'" ("''" | ~("'" | lineBreak) any)* "'"
  charCode = "#" "$"? hexDigit+
  number
    = digit+ ("." digit+)? exponent?  -- decimal
    | "$" hexDigit+                   -- hex
    | "%" ("0" | "1")+                -- binary
    | "&" ("0".."7")+                 -- octal
  exponent = ("e" | "E") ("+" | "-")? digit+
  punct
    = ":=" | "+=" | "-=" | "*=" | "/=" | "<=" | ">=" | "<>" | ".."
    | "(" | ")" | "[" | "]" | "," | ";" | ":" | "." | "=" | "<" | ">"
    | "+" | "-" | "*" | "/" | "^" | "@"
  errorChar = any
  lineBreak = "\n" | "\r"

  // Keywords
  kAsm = caseInsensitive<"asm"> ~identPart
  kBegin = caseInsensitive<"begin"> ~identPart
  kCase = caseInsensitive<"case"> ~identPart
  kClass = caseInsensitive<"class"> ~identPart
  kConst = caseInsensitive<"const"> ~identPart
  kConstructor = caseInsensitive<"constructor"> ~identPart
  kDestructor = caseInsensitive<"destructor"> ~identPart
  kEnd = caseInsensitive<"end"> ~identPart
  kFinalization = caseInsensitive<"finalization"> ~identPart
  kForward = caseInsensitive<"forward"> ~identPart
  kFunction = caseInsensitive<"function"> ~identPart
  kImplementation = caseInsensitive<"implementation"> ~identPart
  kIn = caseInsensitive<"in"> ~identPart
  kInherited = caseInsensitive<"inherited"> ~identPart
  kInitialization = caseInsensitive<"initialization"> ~identPart
  kInterface = caseInsensitive<"interface"> ~identPart
  kInterfaceType = caseInsensitive<"interface"> ~identPart
  kOperator = caseInsensitive<"operator"> ~identPart
  kOut = caseInsensitive<"out"> ~identPart
  kPacked = caseInsensitive<"packed"> ~identPart
  kProcedure = caseInsensitive<"procedure"> ~identPart
  kProgram = caseInsensitive<"program"> ~identPart
  kRecord = caseInsensitive<"record"> ~identPart
  kTry = caseInsensitive<"try"> ~identPart
  kUnit = caseInsensitive<"unit"> ~identPart
  kUses = caseInsensitive<"uses"> ~identPart
  kVar = caseInsensitive<"var"> ~identPart

  reservedWord
    = ${reservedWordRule}

  // A byte-order mark is skipped like whitespace
  space += "\uFEFF"
}
`

/**
 * The compiled outline grammar.
 */
export const PascalGrammar = ohm.grammar(grammarSource)

/**
 * How a grammar rule shows up in the syntax tree.
 * Rules not listed are transparent: their children are spliced into the parent.
 */
interface NodeRule {
	readonly kind: string
	/** Leaf nodes keep no children */
	readonly leaf: boolean
	readonly error?: boolean
}

const container = (kind: string): NodeRule => ({ kind, leaf: false })
const leaf = (kind: string): NodeRule => ({ kind, leaf: true })
const recovery = (kind: string): NodeRule => ({ error: true, kind, leaf: false })
const errorLeaf: NodeRule = { error: true, kind: 'ERROR', leaf: true }

const NODE_RULES: ReadonlyMap<string, NodeRule> = new Map([
	['UnitHeader', container('declUnit')],
	['UnitRecovery', recovery('declUnit')],
	['ProgramHeader', container('declProgram')],
	['ProgramRecovery', recovery('declProgram')],
	['ProgramParams', leaf('programParams')],
	['UsesClause', container('declUses')],
	['UsesRecovery', recovery('declUses')],
	['UsesEntry_located', leaf('moduleName')],
	['InterfaceTypeHead', container('typeInterface')],
	['RoutineDef', container('defProc')],
	['RoutineDecl', container('declProc')],
	['RoutineName', container('routineName')],
	['DeclArgs', container('declArgs')],
	['DeclArg', container('declArg')],
	['Body', container('block')],
	['InheritedStmt', container('statement')],
	['moduleName', leaf('moduleName')],
	['identifier', leaf('identifier')],
	['pp', leaf('pp')],
	['comment', leaf('comment')],
	['unterminatedComment', errorLeaf],
	['stringLiteral', leaf('literalString')],
	['charCode', leaf('literalChar')],
	['number', leaf('literalNumber')],
	['word', leaf('word')],
	['punct', leaf('punct')],
	['errorChar', errorLeaf],
	['kAsm', leaf('kAsm')],
	['kBegin', leaf('kBegin')],
	['kCase', leaf('kCase')],
	['kClass', leaf('kClass')],
	['kConst', leaf('kConst')],
	['kConstructor', leaf('kConstructor')],
	['kDestructor', leaf('kDestructor')],
	['kEnd', leaf('kEnd')],
	['kFinalization', leaf('kFinalization')],
	['kForward', leaf('kForward')],
	['kFunction', leaf('kFunction')],
	['kImplementation', leaf('kImplementation')],
	['kIn', leaf('kIn')],
	['kInherited', leaf('kInherited')],
	['kInitialization', leaf('kInitialization')],
	['kInterface', leaf('kInterface')],
	['kInterfaceType', leaf('kInterfaceType')],
	['kOperator', leaf('kOperator')],
	['kOut', leaf('kOut')],
	['kPacked', leaf('kPacked')],
	['kProcedure', leaf('kProcedure')],
	['kProgram', leaf('kProgram')],
	['kRecord', leaf('kRecord')],
	['kTry', leaf('kTry')],
	['kUnit', leaf('kUnit')],
	['kUses', leaf('kUses')],
	['kVar', leaf('kVar')],
])

/**
 * Tree node before parent links and positions are attached.
 */
export interface RawNode {
	readonly kind: string
	readonly start: number
	readonly end: number
	readonly isError: boolean
	readonly children: readonly RawNode[]
}

function collectChildren(children: readonly Node[]): RawNode[] {
	return children.flatMap((child: Node): RawNode[] => child['toRawNodes']())
}

/**
 * Create semantics for the outline grammar.
 */
export function createSemantics(): Semantics {
	const semantics = PascalGrammar.createSemantics()

	semantics.addOperation<RawNode[]>('toRawNodes', {
		_iter(...children: Node[]) {
			return collectChildren(children)
		},
		_nonterminal(...children: Node[]) {
			const rule = NODE_RULES.get(this.ctorName)
			if (rule === undefined) {
				return collectChildren(children)
			}
			return [
				{
					children: rule.leaf ? [] : collectChildren(children),
					end: this.source.endIdx,
					isError: rule.error ?? false,
					kind: rule.kind,
					start: this.source.startIdx,
				},
			]
		},
		_terminal() {
			return [
				{
					children: [],
					end: this.source.endIdx,
					isError: false,
					kind: this.sourceString,
					start: this.source.startIdx,
				},
			]
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

/**
 * Match input against the grammar without extracting semantics.
 */
export function match(input: string): ohm.MatchResult {
	return PascalGrammar.match(input)
}
