/**
 * AST produced by the formula grammar (grammar/formula.peggy).
 * Node shapes must stay in sync with the grammar actions.
 */

export type BinaryOperator = '+' | '-' | '*' | '/' | '//' | '%' | '**';
export type UnaryOperator = '-' | '+' | 'not';
export type CompareOperator = '==' | '!=' | '<' | '<=' | '>' | '>=' | 'in' | 'not in';
export type LogicalOperator = 'and' | 'or';

export interface NumberNode {
  type: 'Number';
  value: number;
}

export interface StringNode {
  type: 'String';
  value: string;
}

export interface BooleanNode {
  type: 'Boolean';
  value: boolean;
}

export interface NoneNode {
  type: 'None';
}

export interface NameNode {
  type: 'Name';
  name: string;
}

export interface ListNode {
  type: 'List';
  elements: FormulaNode[];
}

export interface UnaryNode {
  type: 'Unary';
  operator: UnaryOperator;
  operand: FormulaNode;
}

export interface BinaryNode {
  type: 'Binary';
  operator: BinaryOperator;
  left: FormulaNode;
  right: FormulaNode;
}

export interface Comparison {
  operator: CompareOperator;
  right: FormulaNode;
}

/** Chained comparison: `a < b <= c` */
export interface CompareNode {
  type: 'Compare';
  left: FormulaNode;
  comparisons: Comparison[];
}

export interface LogicalNode {
  type: 'Logical';
  operator: LogicalOperator;
  left: FormulaNode;
  right: FormulaNode;
}

/** `consequent if test else alternate` */
export interface ConditionalNode {
  type: 'Conditional';
  test: FormulaNode;
  consequent: FormulaNode;
  alternate: FormulaNode;
}

export interface KeywordArgument {
  name: string;
  value: FormulaNode;
}

export interface CallNode {
  type: 'Call';
  callee: FormulaNode;
  args: FormulaNode[];
  keywords: KeywordArgument[];
}

export interface SubscriptNode {
  type: 'Subscript';
  object: FormulaNode;
  index: FormulaNode;
}

export interface AttributeNode {
  type: 'Attribute';
  object: FormulaNode;
  name: string;
}

export type FormulaNode =
  | NumberNode
  | StringNode
  | BooleanNode
  | NoneNode
  | NameNode
  | ListNode
  | UnaryNode
  | BinaryNode
  | CompareNode
  | LogicalNode
  | ConditionalNode
  | CallNode
  | SubscriptNode
  | AttributeNode;
