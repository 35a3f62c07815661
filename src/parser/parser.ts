import { SyntaxNode, Tree } from '@lezer/common';
import { parser as pythonParser } from '@lezer/python';
import { SourceParseError } from '../errors';
import {
  Assign,
  AssignTarget,
  ClassDef,
  Compound,
  Expression,
  FunctionDef,
  Module,
  OtherStatement,
  Parameter,
  Statement,
} from './ast';

const TRIVIA = new Set(['Comment', '(', ')', ':', 'newline']);

/** Source text with a line index over its offsets. */
export class SourceText {
  private readonly lineStarts: number[] = [0];

  constructor(readonly text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  /** 1-based line containing `offset`. */
  lineAt(offset: number): number {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) low = mid;
      else high = mid - 1;
    }
    return low + 1;
  }

  of(node: SyntaxNode): string {
    return this.text.slice(node.from, node.to);
  }
}

function childrenOf(node: SyntaxNode): SyntaxNode[] {
  const children: SyntaxNode[] = [];
  for (let child = node.firstChild; child !== null; child = child.nextSibling) {
    children.push(child);
  }
  return children;
}

/** Text of a leaf node (keywords, punctuation); null for inner nodes. */
function leafText(node: SyntaxNode | null, src: SourceText): string | null {
  if (node === null || node.firstChild !== null) return null;
  return src.of(node);
}

function isStatementNode(node: SyntaxNode): boolean {
  return node.name.endsWith('Statement') || node.name.endsWith('Definition') || node.name === 'StatementGroup';
}

/** Throws on the first error node Lezer inserted while recovering. */
function assertWellFormed(tree: Tree, src: SourceText): void {
  tree.iterate({
    enter: node => {
      if (node.type.isError) {
        throw new SourceParseError('invalid syntax', src.lineAt(node.from));
      }
    },
  });
}

/**
 * Classifies a default value. Only literal constants (numbers, strings,
 * booleans, None, Ellipsis) count as constant; parentheses are transparent.
 */
export function classifyExpression(node: SyntaxNode, src: SourceText): Expression {
  switch (leafText(node, src)) {
    case 'True':
    case 'False':
      return { kind: 'Constant', type: 'boolean' };
    case 'None':
      return { kind: 'Constant', type: 'none' };
    case '...':
      return { kind: 'Constant', type: 'ellipsis' };
    default:
      break;
  }
  switch (node.name) {
    case 'Number':
      return { kind: 'Constant', type: 'number' };
    case 'String':
      return classifyString(node, src);
    case 'FormatString':
      return { kind: 'NonConstant', form: 'other' };
    case 'ContinuedString': {
      const parts = childrenOf(node).filter(child => child.name !== 'Comment');
      if (parts.some(part => part.name !== 'String' || classifyString(part, src).kind !== 'Constant')) {
        return { kind: 'NonConstant', form: 'other' };
      }
      return classifyString(parts[0], src);
    }
    case 'ParenthesizedExpression': {
      const inner = childrenOf(node).filter(child => !TRIVIA.has(child.name));
      if (inner.length === 1) return classifyExpression(inner[0], src);
      return { kind: 'NonConstant', form: 'tuple' };
    }
    case 'TupleExpression':
      return { kind: 'NonConstant', form: 'tuple' };
    case 'ArrayExpression':
    case 'ArrayComprehensionExpression':
      return { kind: 'NonConstant', form: 'list' };
    case 'DictionaryExpression':
    case 'DictionaryComprehensionExpression':
      return { kind: 'NonConstant', form: 'dict' };
    case 'SetExpression':
    case 'SetComprehensionExpression':
      return { kind: 'NonConstant', form: 'set' };
    case 'CallExpression':
      return { kind: 'NonConstant', form: 'call' };
    case 'VariableName':
      return { kind: 'NonConstant', form: 'name' };
    default:
      return { kind: 'NonConstant', form: 'other' };
  }
}

function classifyString(node: SyntaxNode, src: SourceText): Expression {
  const prefix = /^[a-zA-Z]*/.exec(src.of(node))?.[0].toLowerCase() ?? '';
  if (prefix.includes('f')) return { kind: 'NonConstant', form: 'other' };
  return { kind: 'Constant', type: prefix.includes('b') ? 'bytes' : 'string' };
}

export function classifyTarget(nodes: SyntaxNode[], src: SourceText): AssignTarget {
  if (nodes.length !== 1) return { kind: 'Unpacking' };
  const [node] = nodes;
  switch (node.name) {
    case 'VariableName':
      return { kind: 'Name', name: src.of(node) };
    case 'ParenthesizedExpression':
      return classifyTarget(childrenOf(node).filter(child => !TRIVIA.has(child.name)), src);
    case 'TupleExpression':
    case 'ArrayExpression':
      return { kind: 'Unpacking' };
    case 'SubscriptExpression':
      return { kind: 'Subscript' };
    case 'MemberExpression':
      return src.of(node).endsWith(']') ? { kind: 'Subscript' } : { kind: 'Attribute' };
    default:
      return { kind: 'Other' };
  }
}

/** Reads a `ParamList` node: names, kinds and default values. */
export function parseParameters(list: SyntaxNode, src: SourceText): Parameter[] {
  const parameters: Parameter[] = [];
  let keywordOnly = false;
  let star: '*' | '**' | null = null;
  let name: string | null = null;
  let defaultValue: Expression | undefined;
  let expectingDefault = false;

  const flush = (): void => {
    if (name !== null) {
      let kind: Parameter['kind'] = keywordOnly ? 'keyword-only' : 'positional';
      if (star === '*') kind = 'variadic';
      if (star === '**') kind = 'variadic-keyword';
      parameters.push(defaultValue === undefined ? { name, kind } : { name, kind, default: defaultValue });
    }
    if (star === '*') keywordOnly = true;
    star = null;
    name = null;
    defaultValue = undefined;
    expectingDefault = false;
  };

  const markPositionalOnly = (): void => {
    flush();
    for (const parameter of parameters) {
      if (parameter.kind === 'positional') parameter.kind = 'positional-only';
    }
  };

  let previousEnd = list.from;
  for (const child of childrenOf(list)) {
    // `/` may be anonymous, in which case it only shows in the gap text
    if (src.text.slice(previousEnd, child.from).includes('/')) markPositionalOnly();
    previousEnd = child.to;

    const text = leafText(child, src);
    if (text === ',' || text === ')') {
      flush();
    } else if (text === '/') {
      markPositionalOnly();
    } else if (text === '*' || text === '**') {
      star = text;
    } else if (child.name === 'AssignOp' || text === '=') {
      expectingDefault = true;
    } else if (child.name === 'TypeDef' || TRIVIA.has(child.name)) {
      continue;
    } else if (expectingDefault) {
      defaultValue = classifyExpression(child, src);
      expectingDefault = false;
    } else if (child.name === 'VariableName' && name === null) {
      name = src.of(child);
    }
  }
  flush();
  return parameters;
}

class TreeBuilder {
  constructor(private readonly src: SourceText) {}

  module(top: SyntaxNode): Module {
    return { kind: 'Module', body: this.statements(top) };
  }

  private line(node: SyntaxNode): number {
    return this.src.lineAt(node.from);
  }

  /** Statements directly inside a Script or Body node. */
  private statements(container: SyntaxNode | null): Statement[] {
    if (container === null) return [];
    const body: Statement[] = [];
    for (const child of childrenOf(container)) {
      if (isStatementNode(child)) body.push(...this.statement(child));
    }
    return body;
  }

  private statement(node: SyntaxNode): Statement[] {
    switch (node.name) {
      case 'StatementGroup':
        return this.statements(node);
      case 'DecoratedStatement':
        return childrenOf(node)
          .filter(child => child.name === 'FunctionDefinition' || child.name === 'ClassDefinition')
          .flatMap(child => this.statement(child));
      case 'FunctionDefinition':
        return [this.functionDef(node)];
      case 'ClassDefinition':
        return [this.classDef(node)];
      case 'AssignStatement':
        return [this.assign(node)];
      case 'IfStatement':
        return [this.ifChain(node)];
      case 'TryStatement':
        return [this.tryStatement(node)];
      case 'MatchStatement':
        return [this.matchStatement(node)];
      case 'ForStatement':
      case 'WhileStatement':
      case 'WithStatement':
        return [this.loop(node)];
      default: {
        const other: OtherStatement = { kind: 'Other', line: this.line(node) };
        return [other];
      }
    }
  }

  private functionDef(node: SyntaxNode): FunctionDef {
    const isAsync = leafText(node.firstChild, this.src) === 'async' || leafText(node.prevSibling, this.src) === 'async';
    const nameNode = node.getChild('VariableName');
    const params = node.getChild('ParamList');
    return {
      kind: 'FunctionDef',
      name: nameNode === null ? '' : this.src.of(nameNode),
      line: this.line(node),
      isAsync,
      parameters: params === null ? [] : parseParameters(params, this.src),
      body: this.statements(node.getChild('Body')),
    };
  }

  private classDef(node: SyntaxNode): ClassDef {
    const nameNode = node.getChild('VariableName');
    return {
      kind: 'ClassDef',
      name: nameNode === null ? '' : this.src.of(nameNode),
      line: this.line(node),
      body: this.statements(node.getChild('Body')),
    };
  }

  private assign(node: SyntaxNode): Assign | OtherStatement {
    const segments: SyntaxNode[][] = [[]];
    for (const child of childrenOf(node)) {
      const text = leafText(child, this.src);
      // `name: type = value` is an annotated assignment
      if (child.name === 'TypeDef' || text === ':') return { kind: 'Other', line: this.line(node) };
      if (child.name === 'AssignOp' || text === '=') {
        segments.push([]);
      } else if (child.name !== 'Comment') {
        segments[segments.length - 1].push(child);
      }
    }
    const targets = segments.slice(0, -1).map(segment =>
      segment.some(part => leafText(part, this.src) === ',' || leafText(part, this.src) === '*')
        ? { kind: 'Unpacking' as const }
        : classifyTarget(segment, this.src),
    );
    return { kind: 'Assign', line: this.line(node), targets };
  }

  /** Keyword leaves and the Body after each, in source order. */
  private clauses(node: SyntaxNode, keywords: ReadonlySet<string>): { keyword: string; line: number; body: SyntaxNode | null }[] {
    const clauses: { keyword: string; line: number; body: SyntaxNode | null }[] = [];
    for (const child of childrenOf(node)) {
      const text = leafText(child, this.src);
      if (text !== null && keywords.has(text)) {
        clauses.push({ keyword: text, line: this.line(child), body: null });
      } else if (child.name === 'Body' && clauses.length > 0) {
        clauses[clauses.length - 1].body = child;
      }
    }
    return clauses;
  }

  /** `elif` nests as another `if` inside the chain; `else` joins the closing body. */
  private ifChain(node: SyntaxNode): Compound {
    const clauses = this.clauses(node, new Set(['if', 'elif', 'else']));
    const build = (index: number): Compound => {
      const clause = clauses[index];
      const body = this.statements(clause.body);
      const next = clauses[index + 1];
      if (next !== undefined && next.keyword === 'elif') body.push(build(index + 1));
      else if (next !== undefined && next.keyword === 'else') body.push(...this.statements(next.body));
      return { kind: 'Compound', keyword: clause.keyword, line: clause.line, body };
    };
    if (clauses.length === 0) return { kind: 'Compound', keyword: 'if', line: this.line(node), body: [] };
    return build(0);
  }

  /** Handlers sit one level below the `try` body; `else` and `finally` do not. */
  private tryStatement(node: SyntaxNode): Compound {
    const body: Statement[] = [];
    for (const clause of this.clauses(node, new Set(['try', 'except', 'else', 'finally']))) {
      const statements = this.statements(clause.body);
      if (clause.keyword === 'except') {
        body.push({ kind: 'Compound', keyword: 'except', line: clause.line, body: statements });
      } else {
        body.push(...statements);
      }
    }
    return { kind: 'Compound', keyword: 'try', line: this.line(node), body };
  }

  private loop(node: SyntaxNode): Compound {
    const keyword = leafText(node.firstChild, this.src) ?? node.name;
    const body = childrenOf(node)
      .filter(child => child.name === 'Body')
      .flatMap(child => this.statements(child));
    return { kind: 'Compound', keyword, line: this.line(node), body };
  }

  private matchStatement(node: SyntaxNode): Compound {
    const cases: Compound[] = [];
    const collect = (parent: SyntaxNode): void => {
      for (const child of childrenOf(parent)) {
        if (child.name === 'Body') continue;
        if (leafText(child.firstChild, this.src) === 'case' && child.getChild('Body') !== null) {
          cases.push({
            kind: 'Compound',
            keyword: 'case',
            line: this.line(child),
            body: this.statements(child.getChild('Body')),
          });
        } else if (child.firstChild !== null) {
          collect(child);
        }
      }
    };
    collect(node);
    return { kind: 'Compound', keyword: 'match', line: this.line(node), body: cases };
  }
}

/**
 * Parses Python source. Throws SourceParseError when the grammar had to
 * recover from an error anywhere in the file.
 */
export function parse(source: string): Module {
  const src = new SourceText(source.replace(/\r\n?/g, '\n'));
  const tree = pythonParser.parse(src.text);
  assertWellFormed(tree, src);
  return new TreeBuilder(src).module(tree.topNode);
}
