import { LineRule, RuleCode } from '../types';
import { BlankRunTracker, stripNewline } from './blank-run-tracker';

export const MAX_LINE_LENGTH = 79;

/** Text before the first `#`, and whether there was one. */
function splitComment(line: string): { code: string; comment: string | null } {
  const hash = line.indexOf('#');
  if (hash === -1) return { code: line, comment: null };
  return { code: line.slice(0, hash), comment: line.slice(hash + 1) };
}

export const tooLongRule: LineRule = {
  code: 'S001',
  check: line => [...stripNewline(line)].length > MAX_LINE_LENGTH,
};

export const indentationRule: LineRule = {
  code: 'S002',
  check(line) {
    let spaces = 0;
    while (spaces < line.length && line[spaces] === ' ') spaces++;
    return spaces > 0 && spaces % 4 !== 0;
  },
};

export const semicolonRule: LineRule = {
  code: 'S003',
  check: line => splitComment(line).code.trimEnd().endsWith(';'),
};

export const commentSpacingRule: LineRule = {
  code: 'S004',
  check(line) {
    // Full-line comments are exempt; indented ones are not.
    if (line.startsWith('#')) return false;
    const { code, comment } = splitComment(line);
    return comment !== null && !code.endsWith('  ');
  },
};

export const todoRule: LineRule = {
  code: 'S005',
  check(line) {
    const { comment } = splitComment(line);
    return comment !== null && comment.toLowerCase().includes('todo');
  },
};

const DEF_SPACING = /^[^#]? *_?_?def {2,}/;
const CLASS_SPACING = /^[^#]? *class {2,}/;

export const constructionSpacingRule: LineRule = {
  code: 'S007',
  check: line => DEF_SPACING.test(line) || CLASS_SPACING.test(line),
};

const CLASS_LOWERCASE = /^ *class +[a-z]/;
// A-z also spans [ \ ] ^ _ and the backtick
const CLASS_UNDERSCORE = /^ *class +[a-zA-z]+_/;

export const classNameRule: LineRule = {
  code: 'S008',
  check: line => CLASS_LOWERCASE.test(line) || CLASS_UNDERSCORE.test(line),
};

const FUNCTION_NOT_SNAKE = /^ *def +[a-z0-9_]*[A-Z]/;

export const functionNameRule: LineRule = {
  code: 'S009',
  check: line => FUNCTION_NOT_SNAKE.test(line),
};

export function blankRunRule(tracker: BlankRunTracker): LineRule {
  return {
    code: 'S006',
    check: line => tracker.observe(line),
  };
}

/**
 * The line checks for one file, in evaluation order. Every call returns a
 * fresh blank-line tracker, so each file starts with an empty run.
 */
export function createLineRules(): LineRule[] {
  return [
    tooLongRule,
    indentationRule,
    semicolonRule,
    commentSpacingRule,
    todoRule,
    blankRunRule(new BlankRunTracker()),
    constructionSpacingRule,
    classNameRule,
    functionNameRule,
  ];
}

/**
 * Runs the line checks over one file's lines. Not reusable across files:
 * the blank-line run carries over from line to line.
 */
export class LineRuleSet {
  private readonly rules: LineRule[];

  constructor(rules: LineRule[] = createLineRules()) {
    this.rules = rules;
  }

  evaluate(line: string, lineNumber: number): RuleCode[] {
    const codes: RuleCode[] = [];
    for (const rule of this.rules) {
      if (rule.check(line, lineNumber)) codes.push(rule.code);
    }
    return codes;
  }
}

/**
 * Split source text into physical lines, each keeping its `\n`.
 * `\r\n` and lone `\r` count as line ends.
 */
export function splitLines(source: string): string[] {
  const normalized = source.replace(/\r\n?/g, '\n');
  if (normalized === '') return [];
  const parts = normalized.split('\n');
  const lines = parts.slice(0, -1).map(part => `${part}\n`);
  const last = parts[parts.length - 1];
  if (last !== '') lines.push(last);
  return lines;
}
