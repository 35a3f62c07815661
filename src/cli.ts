import * as path from 'path';
import chalk from 'chalk';
import { analyzeInto, buildReport } from './analyzer';
import { FindingsStore } from './findings-store';
import { AnalysisReport } from './types';
import { loadConfig, mergeOptions } from './utils/config';
import { printFindings, printSummary, writeJsonReport } from './utils/reporter';

export interface CliOptions {
  ignore?: string[];
  exclude?: string[];
  config?: string;
  json?: boolean;
  output?: string;
  verbose?: boolean;
}

export const DEFAULT_REPORT_FILE = 'pystyle-report.json';

/**
 * Analyze `targetPath` and print one line per finding. On a fatal error the
 * findings collected so far are still printed before the error propagates.
 */
export async function runAnalysis(targetPath: string, options: CliOptions = {}): Promise<AnalysisReport> {
  const loaded = loadConfig(options.config);
  const analyzeOptions = mergeOptions(loaded?.config ?? null, options);

  if (options.verbose) {
    console.error(chalk.gray(`  Target: ${targetPath}`));
    if (loaded) console.error(chalk.gray(`  Config: ${loaded.source}`));
    if (analyzeOptions.ignore && analyzeOptions.ignore.length > 0) {
      console.error(chalk.gray(`  Ignore: ${analyzeOptions.ignore.join(', ')}`));
    }
    if (analyzeOptions.exclude && analyzeOptions.exclude.length > 0) {
      console.error(chalk.gray(`  Exclude: ${analyzeOptions.exclude.join(', ')}`));
    }
  }

  const start = Date.now();
  const store = new FindingsStore(analyzeOptions.ignore);
  let filesAnalyzed: number;
  try {
    filesAnalyzed = await analyzeInto(store, targetPath, analyzeOptions.exclude);
  } finally {
    printFindings(store);
  }

  const report = buildReport(targetPath, store, filesAnalyzed, Date.now() - start);

  if (options.verbose) {
    printSummary(report);
  }
  if (options.json || options.output) {
    const outputPath = options.output ?? path.join(process.cwd(), DEFAULT_REPORT_FILE);
    writeJsonReport(report, outputPath);
  }

  return report;
}
