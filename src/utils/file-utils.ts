import * as fs from 'fs';
import * as path from 'path';
import { TextDecoder } from 'util';
import { glob } from 'glob';
import { SourceReadError } from '../errors';

export const SOURCE_EXTENSION = '.py';

/** Reads a file as strict UTF-8; invalid byte sequences are an error. */
export function readFileContent(filePath: string): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(fs.readFileSync(filePath));
  } catch (err) {
    throw new SourceReadError(filePath, err);
  }
}

export function fileExists(filePath: string): boolean {
  return fs.existsSync(filePath);
}

export function isDirectory(filePath: string): boolean {
  return fs.statSync(filePath).isDirectory();
}

export function isSourceFile(filePath: string): boolean {
  return filePath.endsWith(SOURCE_EXTENSION);
}

/**
 * Python files directly inside `dir` (no recursion), as `dir`-joined paths
 * sorted by name. `exclude` holds glob patterns matched against file names.
 */
export async function discoverSourceFiles(dir: string, exclude: string[] = []): Promise<string[]> {
  const names = await glob(`*${SOURCE_EXTENSION}`, {
    cwd: dir,
    nodir: true,
    dot: true,
    ignore: exclude,
  });
  return names.sort().map(name => path.join(dir, name));
}
