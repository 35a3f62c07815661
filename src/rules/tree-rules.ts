import { Assign, FunctionDef, Module } from '../parser/ast';
import { parse } from '../parser/parser';
import { walk } from '../parser/walk';
import { Finding } from '../types';

const HAS_UPPERCASE = /[A-Z]/;

/**
 * S010 for every ordinary positional parameter with an uppercase letter,
 * then S012 when the first positional default is not a literal constant.
 * All findings sit on the `def` line. `async def` is not inspected.
 */
export function checkFunction(node: FunctionDef): Finding[] {
  const findings: Finding[] = [];
  if (node.isAsync) return findings;

  for (const parameter of node.parameters) {
    if (parameter.kind === 'positional' && HAS_UPPERCASE.test(parameter.name)) {
      findings.push({ line: node.line, code: 'S010' });
    }
  }

  // Only the first default is inspected.
  const firstDefault = node.parameters.find(
    p => (p.kind === 'positional-only' || p.kind === 'positional') && p.default !== undefined,
  )?.default;
  if (firstDefault !== undefined && firstDefault.kind === 'NonConstant') {
    findings.push({ line: node.line, code: 'S012' });
  }

  return findings;
}

export function checkAssign(node: Assign): Finding[] {
  const findings: Finding[] = [];
  for (const target of node.targets) {
    if (target.kind === 'Name' && HAS_UPPERCASE.test(target.name)) {
      findings.push({ line: node.line, code: 'S011' });
    }
  }
  return findings;
}

/**
 * Naming and mutable-default checks over a parsed module. Assignments are
 * only checked inside function bodies; module and class level names are
 * left alone.
 */
export class SyntaxTreeRuleSet {
  evaluate(module: Module): Finding[] {
    const findings: Finding[] = [];
    for (const { node, scope } of walk(module)) {
      switch (node.kind) {
        case 'FunctionDef':
          findings.push(...checkFunction(node));
          break;
        case 'Assign':
          if (scope === 'function') findings.push(...checkAssign(node));
          break;
        case 'Module':
        case 'ClassDef':
        case 'Compound':
        case 'Other':
          break;
      }
    }
    return findings;
  }

  /** Parses `source` and evaluates it. Throws SourceParseError on malformed input. */
  check(source: string): Finding[] {
    return this.evaluate(parse(source));
  }
}
