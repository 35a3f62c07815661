import { Finding, RuleCode } from './types';

/**
 * Findings of one run, per file, in the order they were discovered.
 */
export class FindingsStore {
  private readonly byFile = new Map<string, Finding[]>();
  private readonly ignored: ReadonlySet<RuleCode>;

  constructor(ignore: Iterable<RuleCode> = []) {
    this.ignored = new Set(ignore);
  }

  record(file: string, line: number, code: RuleCode): void {
    if (this.ignored.has(code)) return;
    const findings = this.byFile.get(file);
    if (findings) {
      findings.push({ line, code });
    } else {
      this.byFile.set(file, [{ line, code }]);
    }
  }

  recordAll(file: string, findings: Iterable<Finding>): void {
    for (const finding of findings) {
      this.record(file, finding.line, finding.code);
    }
  }

  findingsFor(file: string): readonly Finding[] {
    return this.byFile.get(file) ?? [];
  }

  /** Files with at least one finding, sorted by path. */
  files(): string[] {
    return [...this.byFile.keys()].sort();
  }

  entries(): Array<[string, readonly Finding[]]> {
    return this.files().map(file => [file, this.findingsFor(file)]);
  }

  get size(): number {
    let total = 0;
    for (const findings of this.byFile.values()) total += findings.length;
    return total;
  }

  countByCode(): Partial<Record<RuleCode, number>> {
    const counts: Partial<Record<RuleCode, number>> = {};
    for (const findings of this.byFile.values()) {
      for (const { code } of findings) {
        counts[code] = (counts[code] ?? 0) + 1;
      }
    }
    return counts;
  }
}
