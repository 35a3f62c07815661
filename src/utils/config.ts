import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError } from '../errors';
import { isRuleCode } from '../rules/catalog';
import { AnalyzeOptions, RuleCode } from '../types';

export const CONFIG_FILE_NAMES = ['.pystylerc.yml', '.pystylerc.yaml'];

export interface PyStyleConfig {
  ignore: RuleCode[];
  exclude: string[];
}

const KNOWN_KEYS = new Set(['ignore', 'exclude']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringList(value: unknown, key: string, source: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ConfigError(source, `'${key}' must be a list of strings`);
  }
  return value;
}

export function parseRuleCodes(values: string[], source: string): RuleCode[] {
  return values.map(value => {
    const code = value.trim().toUpperCase();
    if (!isRuleCode(code)) {
      throw new ConfigError(source, `unknown rule code '${value}'`);
    }
    return code;
  });
}

/**
 * Parse the YAML text of a config file. An empty document is an empty config.
 */
export function parseConfig(content: string, source: string): PyStyleConfig {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (err) {
    throw new ConfigError(source, err instanceof Error ? err.message : String(err));
  }
  if (parsed === undefined || parsed === null) {
    return { ignore: [], exclude: [] };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(source, 'expected a mapping at the top level');
  }
  const unknown = Object.keys(parsed).filter(key => !KNOWN_KEYS.has(key));
  if (unknown.length > 0) {
    throw new ConfigError(source, `unknown key${unknown.length > 1 ? 's' : ''} ${unknown.map(k => `'${k}'`).join(', ')}`);
  }
  return {
    ignore: parseRuleCodes(readStringList(parsed.ignore, 'ignore', source), source),
    exclude: readStringList(parsed.exclude, 'exclude', source),
  };
}

export function findConfigFile(dir: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(dir, name);
    if (fs.existsSync(candidate)) return candidate;
  }
  return null;
}

/**
 * Load `explicitPath`, or the first config file found in `cwd`.
 * Returns null when there is no config file to load.
 */
export function loadConfig(explicitPath?: string, cwd: string = process.cwd()): { config: PyStyleConfig; source: string } | null {
  const source = explicitPath ?? findConfigFile(cwd);
  if (source === null) return null;
  let content: string;
  try {
    content = fs.readFileSync(source, 'utf-8');
  } catch (err) {
    throw new ConfigError(source, err instanceof Error ? err.message : String(err));
  }
  return { config: parseConfig(content, source), source };
}

/** Command-line values are added to the file's. */
export function mergeOptions(config: PyStyleConfig | null, cli: { ignore?: string[]; exclude?: string[] }): AnalyzeOptions {
  const ignore = new Set<RuleCode>([...(config?.ignore ?? []), ...parseRuleCodes(cli.ignore ?? [], 'command line')]);
  const exclude = new Set([...(config?.exclude ?? []), ...(cli.exclude ?? [])]);
  return { ignore: [...ignore], exclude: [...exclude] };
}
