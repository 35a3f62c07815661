export { analyzeFile, analyzeInto, analyzePath, analyzeSource, buildReport, collectTargets, VERSION } from './analyzer';
export { ConfigError, PyStyleError, SourceParseError, SourceReadError, TargetNotFoundError } from './errors';
export { FindingsStore } from './findings-store';
export { parse } from './parser/parser';
export { walk } from './parser/walk';
export { BlankRunTracker } from './rules/blank-run-tracker';
export { describeRule, isRuleCode, RULE_CODES, RULE_DESCRIPTIONS } from './rules/catalog';
export { createLineRules, LineRuleSet, splitLines } from './rules/line-rules';
export { SyntaxTreeRuleSet } from './rules/tree-rules';
export { formatFinding } from './utils/reporter';
export * from './types';
export * from './parser/ast';
