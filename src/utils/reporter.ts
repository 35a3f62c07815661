import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { describeRule, RULE_CODES } from '../rules/catalog';
import { AnalysisReport, Finding } from '../types';
import { FindingsStore } from '../findings-store';

export function formatFinding(file: string, finding: Finding): string {
  return `${file}: Line ${finding.line}: ${finding.code} ${describeRule(finding.code)}`;
}

/** One line per finding on stdout, files sorted by path. */
export function printFindings(store: FindingsStore): void {
  for (const [file, findings] of store.entries()) {
    for (const finding of findings) {
      console.log(formatFinding(file, finding));
    }
  }
}

/**
 * Run summary on stderr so that stdout stays one finding per line.
 */
export function printSummary(report: AnalysisReport): void {
  const s = report.summary;
  const fileWord = s.filesAnalyzed === 1 ? 'file' : 'files';
  const findingWord = s.totalFindings === 1 ? 'finding' : 'findings';
  const total = s.totalFindings > 0 ? chalk.yellow(String(s.totalFindings)) : chalk.green('0');

  console.error('');
  console.error(`  ${total} ${findingWord} in ${s.filesAnalyzed} ${fileWord} ${chalk.gray(`(${s.duration}ms)`)}`);
  for (const code of RULE_CODES) {
    const count = s.byCode[code];
    if (count === undefined) continue;
    console.error(chalk.gray(`    ${code} ${String(count).padStart(4)}  ${describeRule(code)}`));
  }
}

export function writeJsonReport(report: AnalysisReport, outputPath: string): void {
  const dir = path.dirname(outputPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(outputPath, JSON.stringify(report, null, 2), 'utf-8');
  console.error(chalk.gray(`  JSON report saved to: ${outputPath}`));
}
