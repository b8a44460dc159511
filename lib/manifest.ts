import { minimatch } from 'minimatch';
import * as fs from 'fs';
import * as path from 'path';
import { fsAsync } from './asyncFs';
import { ConfigurationError, errnoCode } from './errors';
import { chomp } from './util';

export type EntryStatus = 'file' | 'dir' | 'link' | 'excluded' | 'error';

export interface ManifestEntry {
  /**
   * Path relative to the source root, POSIX separators
   */
  path: string;
  status: EntryStatus;
}

export type ManifestSummary = Record<EntryStatus, number>;

const MATCH_OPTIONS = { dot: true };

function matchesFromAnySegment(relativePath: string, pattern: string): boolean {
  const segments = relativePath.split('/');

  for (let i = 0; i < segments.length; i++) {
    if (minimatch(segments.slice(i).join('/'), pattern, MATCH_OPTIONS)) {
      return true;
    }
  }
  return false;
}

/**
 * rsync's `**` spans slashes anywhere in a pattern, minimatch's only as a whole segment
 */
function expandGlobstar(pattern: string): string {
  return pattern
    .split('/')
    .map(segment => segment === '**' || !segment.includes('**') ? segment : segment.replace(/\*\*+/g, '{*,*/**/*}'))
    .join('/');
}

/**
 * Check if the path matches one of the exclude patterns, following rsync's rules:
 * a trailing `/` only matches directories, a leading `/` anchors the pattern
 * at the transfer root, a pattern with an inner `/` or a `**` is matched
 * against the end of the path, anything else against the entry's name.
 */
export function isExcluded(relativePath: string, isDirectory: boolean, patterns: readonly string[]): boolean {
  const name = path.posix.basename(relativePath);

  return patterns.some(raw => {
    if (raw.endsWith('/') && !isDirectory) {
      return false;
    }

    let pattern = expandGlobstar(chomp(raw, '/'));

    if (pattern.startsWith('/')) {
      pattern = pattern.slice(1);
      return minimatch(relativePath, pattern, MATCH_OPTIONS);
    }
    if (pattern.includes('/') || pattern.includes('**')) {
      return matchesFromAnySegment(relativePath, pattern);
    }
    return minimatch(name, pattern, MATCH_OPTIONS);
  });
}

/**
 * Make sure the source is a readable directory
 */
export async function verifySourceDirectory(sourcePath: string): Promise<void> {
  try {
    const stat = await fsAsync.stat(sourcePath);
    if (!stat.isDirectory()) {
      throw new ConfigurationError(`Local Error: Not a directory ${sourcePath}`);
    }
    await fsAsync.access(sourcePath, fs.constants.R_OK | fs.constants.X_OK);
  } catch (err) {
    switch (errnoCode(err)) {
      case 'ENOENT' : throw new ConfigurationError(`Local Error: No such directory ${sourcePath}`);
      case 'ENOTDIR': throw new ConfigurationError(`Local Error: Not a directory ${sourcePath}`);
      case 'EPERM'  :
      case 'EACCES' : throw new ConfigurationError(`Local Error: Cannot read directory. Permission denied ${sourcePath}`);
      default       : throw err;
    }
  }
}

async function walk(
  root: string,
  relativePath: string,
  patterns: readonly string[],
  entries: ManifestEntry[]
): Promise<void> {
  let files: string[];

  try {
    files = await fsAsync.readdir(path.join(root, relativePath));
  } catch (err) {
    if (relativePath === '') throw err;
    entries.push({ path: relativePath, status: 'error' });
    return;
  }

  for (const filename of files.sort()) {
    const entryPath = relativePath ? path.posix.join(relativePath, filename) : filename;
    let stat: fs.Stats;

    try {
      stat = await fsAsync.lstat(path.join(root, entryPath));
    } catch (err) {
      entries.push({ path: entryPath, status: 'error' });
      continue;
    }

    const isDirectory = stat.isDirectory();

    if (isExcluded(entryPath, isDirectory, patterns)) {
      entries.push({ path: entryPath, status: 'excluded' });
    } else if (isDirectory) {
      entries.push({ path: entryPath, status: 'dir' });
      await walk(root, entryPath, patterns, entries);
    } else {
      entries.push({ path: entryPath, status: stat.isSymbolicLink() ? 'link' : 'file' });
    }
  }
}

/**
 * List what a sync of `sourceRoot` would consider, depth first with names sorted.
 * Excluded directories are listed but not descended into.
 */
export async function buildManifest(sourceRoot: string, patterns: readonly string[]): Promise<ManifestEntry[]> {
  await verifySourceDirectory(sourceRoot);

  const entries: ManifestEntry[] = [];
  await walk(sourceRoot, '', patterns, entries);
  return entries;
}

export function summarize(entries: readonly ManifestEntry[]): ManifestSummary {
  const summary: ManifestSummary = { file: 0, dir: 0, link: 0, excluded: 0, error: 0 };

  for (const entry of entries) {
    summary[entry.status]++;
  }
  return summary;
}
