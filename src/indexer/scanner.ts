/**
 * File Scanner
 *
 * Finds ingestible files under a directory with fast-glob. Dotfiles and
 * dot-directories are never matched; dependency and build directories,
 * plus anything in the root .gitignore, are skipped through `ignore`.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import fg from 'fast-glob';
import ignore, { type Ignore } from 'ignore';

/**
 * Directories that never hold documents worth ingesting.
 */
export const DEFAULT_IGNORE_PATTERNS = [
  'node_modules',
  'bower_components',
  'vendor',
  'venv',
  '__pycache__',
  'dist',
  'build',
  'coverage',
];

export interface ScanOptions {
  /** Extensions with a leading dot, e.g. ".md"; matched case-insensitively */
  extensions: readonly string[];
  /** Extra gitignore-style patterns */
  ignorePatterns?: readonly string[];
}

/**
 * Parse .gitignore content into patterns, dropping comments and blanks.
 */
export function parseGitignoreContent(content: string): string[] {
  return content
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

function createIgnore(rootPath: string, extra: readonly string[]): Ignore {
  const ig = ignore().add(DEFAULT_IGNORE_PATTERNS);
  const gitignorePath = join(rootPath, '.gitignore');
  if (existsSync(gitignorePath)) {
    ig.add(parseGitignoreContent(readFileSync(gitignorePath, 'utf-8')));
  }
  return ig.add([...extra]);
}

/**
 * Glob patterns for a set of extensions. A one-element brace set is not
 * expanded by the matcher, so a single extension gets its own pattern.
 */
export function buildGlobPatterns(extensions: readonly string[]): string[] {
  const bare = [...new Set(extensions.map((ext) => ext.replace(/^\./, '').toLowerCase()))];
  if (bare.length === 0) {
    return [];
  }
  return bare.length === 1 ? [`**/*.${bare[0]}`] : [`**/*.{${bare.join(',')}}`];
}

/**
 * Absolute paths of the matching files under `rootPath`, sorted.
 *
 * Symlinks are not followed, so a dangling link is skipped rather than
 * failing the scan. Unreadable subdirectories are skipped too.
 *
 * @example
 * ```ts
 * const files = await scanDirectory('./statements', { extensions: ['.pdf', '.csv'] });
 * ```
 */
export async function scanDirectory(rootPath: string, options: ScanOptions): Promise<string[]> {
  const absoluteRoot = resolve(rootPath);
  const patterns = buildGlobPatterns(options.extensions);
  if (patterns.length === 0) {
    return [];
  }
  const ig = createIgnore(absoluteRoot, options.ignorePatterns ?? []);

  const entries = await fg(patterns, {
    cwd: absoluteRoot,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    caseSensitiveMatch: false,
    suppressErrors: true,
  });

  return entries
    .filter((entry) => !ig.ignores(entry))
    .sort()
    .map((entry) => join(absoluteRoot, entry));
}
