/**
 * Operator and punctuation classes recognized by the text scanner.
 */

/** Operator classes - the closed set of spacing-policy keys. */
export const OperatorClass = {
	Add: 'add',
	Assign: 'assign',
	AssignAdd: 'assignAdd',
	AssignDiv: 'assignDiv',
	AssignMul: 'assignMul',
	AssignSub: 'assignSub',
	Colon: 'colon',
	Comma: 'comma',
	Eq: 'eq',
	FDiv: 'fdiv',
	Gt: 'gt',
	Gte: 'gte',
	Lt: 'lt',
	Lte: 'lte',
	Mul: 'mul',
	Neq: 'neq',
	Semicolon: 'semicolon',
	Sub: 'sub',
} as const

export type OperatorClass = (typeof OperatorClass)[keyof typeof OperatorClass]

export interface OperatorDef {
	readonly text: string
	readonly operatorClass: OperatorClass
}

// Two-character operators come first: they win over their one-character prefix.
const OPERATORS: readonly OperatorDef[] = [
	{ operatorClass: OperatorClass.Assign, text: ':=' },
	{ operatorClass: OperatorClass.AssignAdd, text: '+=' },
	{ operatorClass: OperatorClass.AssignSub, text: '-=' },
	{ operatorClass: OperatorClass.AssignMul, text: '*=' },
	{ operatorClass: OperatorClass.AssignDiv, text: '/=' },
	{ operatorClass: OperatorClass.Lte, text: '<=' },
	{ operatorClass: OperatorClass.Gte, text: '>=' },
	{ operatorClass: OperatorClass.Neq, text: '<>' },
	{ operatorClass: OperatorClass.Colon, text: ':' },
	{ operatorClass: OperatorClass.Add, text: '+' },
	{ operatorClass: OperatorClass.Sub, text: '-' },
	{ operatorClass: OperatorClass.Mul, text: '*' },
	{ operatorClass: OperatorClass.FDiv, text: '/' },
	{ operatorClass: OperatorClass.Lt, text: '<' },
	{ operatorClass: OperatorClass.Gt, text: '>' },
	{ operatorClass: OperatorClass.Eq, text: '=' },
	{ operatorClass: OperatorClass.Comma, text: ',' },
	{ operatorClass: OperatorClass.Semicolon, text: ';' },
]

/**
 * Longest operator starting at `index`, if any.
 */
export function matchOperator(input: string, index: number): OperatorDef | undefined {
	return OPERATORS.find((op) => input.startsWith(op.text, index))
}
