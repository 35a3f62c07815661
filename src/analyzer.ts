import * as path from 'path';
import { SourceParseError, TargetNotFoundError } from './errors';
import { FindingsStore } from './findings-store';
import { describeRule } from './rules/catalog';
import { LineRuleSet, splitLines } from './rules/line-rules';
import { SyntaxTreeRuleSet } from './rules/tree-rules';
import { AnalysisReport, AnalyzeOptions, Finding } from './types';
import { discoverSourceFiles, fileExists, isDirectory, readFileContent } from './utils/file-utils';

export const VERSION = '0.1.0';

/**
 * Runs both passes over one file's source. Line findings are recorded
 * before the source is parsed, so they stay in the store when parsing fails.
 */
export function analyzeSource(file: string, source: string, store: FindingsStore): void {
  const lineRules = new LineRuleSet();
  splitLines(source).forEach((line, index) => {
    for (const code of lineRules.evaluate(line, index + 1)) {
      store.record(file, index + 1, code);
    }
  });

  let treeFindings: Finding[];
  try {
    treeFindings = new SyntaxTreeRuleSet().check(source);
  } catch (err) {
    if (err instanceof SourceParseError) throw err.inFile(file);
    throw err;
  }
  store.recordAll(file, treeFindings);
}

export function analyzeFile(file: string, store: FindingsStore): void {
  analyzeSource(file, readFileContent(file), store);
}

/**
 * Files to analyze for `target`: the file itself, or the Python files
 * directly inside it when it is a directory.
 */
export async function collectTargets(target: string, exclude: string[] = []): Promise<string[]> {
  if (!fileExists(target)) {
    throw new TargetNotFoundError(target);
  }
  const normalized = path.normalize(target);
  if (!isDirectory(normalized)) return [normalized];
  return discoverSourceFiles(normalized, exclude);
}

export function buildReport(target: string, store: FindingsStore, filesAnalyzed: number, duration: number): AnalysisReport {
  return {
    version: VERSION,
    timestamp: new Date().toISOString(),
    target,
    files: store.entries().map(([file, findings]) => ({
      file,
      findings: findings.map(f => ({ ...f, description: describeRule(f.code) })),
    })),
    summary: {
      filesAnalyzed,
      totalFindings: store.size,
      byCode: store.countByCode(),
      duration,
    },
  };
}

/**
 * Analyzes every file under `target` into `store`, stopping at the first
 * failure. Returns the number of files analyzed.
 */
export async function analyzeInto(store: FindingsStore, target: string, exclude: string[] = []): Promise<number> {
  const files = await collectTargets(target, exclude);
  for (const file of files) {
    analyzeFile(file, store);
  }
  return files.length;
}

export async function analyzePath(target: string, options: AnalyzeOptions = {}): Promise<AnalysisReport> {
  const start = Date.now();
  const store = new FindingsStore(options.ignore);
  const filesAnalyzed = await analyzeInto(store, target, options.exclude);
  return buildReport(target, store, filesAnalyzed, Date.now() - start);
}
