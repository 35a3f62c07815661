export type RuleCode =
  | 'S001'
  | 'S002'
  | 'S003'
  | 'S004'
  | 'S005'
  | 'S006'
  | 'S007'
  | 'S008'
  | 'S009'
  | 'S010'
  | 'S011'
  | 'S012';

export interface Finding {
  line: number; // 1-based
  code: RuleCode;
}

/**
 * A check applied to one physical line. `line` keeps its trailing newline
 * (the last line of a file may have none).
 */
export interface LineRule {
  code: RuleCode;
  check(line: string, lineNumber: number): boolean;
}

export interface AnalyzeOptions {
  /** Rule codes whose findings are dropped before they reach the store. */
  ignore?: RuleCode[];
  /** Glob patterns matched against file names during directory discovery. */
  exclude?: string[];
}

export interface ReportedFinding extends Finding {
  description: string;
}

export interface FileReport {
  file: string;
  findings: ReportedFinding[];
}

export interface ReportSummary {
  filesAnalyzed: number;
  totalFindings: number;
  byCode: Partial<Record<RuleCode, number>>;
  duration: number; // ms
}

export interface AnalysisReport {
  version: string;
  timestamp: string;
  target: string;
  files: FileReport[];
  summary: ReportSummary;
}
