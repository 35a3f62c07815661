/**
 * Syntax tree for the subset of Python the tree rules look at.
 *
 * Statements the rules do not care about are kept as `Other` so that the
 * nesting (and therefore the enclosing scope of every node) stays intact.
 */

export interface Module {
  kind: 'Module';
  body: Statement[];
}

export type ParameterKind =
  | 'positional-only'
  | 'positional'
  | 'variadic'
  | 'keyword-only'
  | 'variadic-keyword';

export interface Parameter {
  name: string;
  kind: ParameterKind;
  default?: Expression;
}

export interface FunctionDef {
  kind: 'FunctionDef';
  name: string;
  line: number; // line of the `def` keyword
  isAsync: boolean;
  parameters: Parameter[];
  body: Statement[];
}

export interface ClassDef {
  kind: 'ClassDef';
  name: string;
  line: number;
  body: Statement[];
}

export type AssignTarget =
  | { kind: 'Name'; name: string }
  | { kind: 'Attribute' }
  | { kind: 'Subscript' }
  | { kind: 'Unpacking' }
  | { kind: 'Other' };

/** Plain `a = b = value`; annotated and augmented assignments are `Other`. */
export interface Assign {
  kind: 'Assign';
  line: number;
  targets: AssignTarget[];
}

/**
 * Block statement. `elif` is an `if` nested in the chain, and every `except`
 * handler and `case` block is its own Compound, one level below the header.
 */
export interface Compound {
  kind: 'Compound';
  keyword: string;
  line: number;
  body: Statement[];
}

export interface OtherStatement {
  kind: 'Other';
  line: number;
}

export type Statement = FunctionDef | ClassDef | Assign | Compound | OtherStatement;

export type Node = Module | Statement;

export interface Constant {
  kind: 'Constant';
  type: 'number' | 'string' | 'bytes' | 'boolean' | 'none' | 'ellipsis';
}

export type ExpressionForm = 'list' | 'dict' | 'set' | 'tuple' | 'call' | 'name' | 'other';

export interface NonConstant {
  kind: 'NonConstant';
  form: ExpressionForm;
}

export type Expression = Constant | NonConstant;
