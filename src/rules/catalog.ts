import { RuleCode } from '../types';

export const RULE_DESCRIPTIONS: Readonly<Record<RuleCode, string>> = Object.freeze({
  S001: 'Too long',
  S002: 'Indentation is not a multiple of four',
  S003: 'Unnecessary semicolon after a statement',
  S004: 'Less than two spaces before inline comments',
  S005: 'TODO found',
  S006: 'More than two blank lines preceding a code line',
  S007: 'Too many spaces after construction_name (def or class)',
  S008: 'Class name class_name should be written in CamelCase',
  S009: 'Function name function_name should be written in snake_case',
  S010: 'Argument name arg_name should be written in snake_case',
  S011: 'Variable var_name should be written in snake_case',
  S012: 'The default argument value is mutable',
});

export const RULE_CODES: readonly RuleCode[] = [
  'S001', 'S002', 'S003', 'S004', 'S005', 'S006',
  'S007', 'S008', 'S009', 'S010', 'S011', 'S012',
];

export function isRuleCode(value: string): value is RuleCode {
  return RULE_CODES.some(code => code === value);
}

export function describeRule(code: RuleCode): string {
  return RULE_DESCRIPTIONS[code];
}
