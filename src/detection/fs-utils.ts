/**
 * Filesystem helpers shared by the detector and the analysis context.
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';
import { TextDecoder } from 'node:util';

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

export const SKIP_DIRS = new Set([
  'node_modules', 'dist', 'build', '.git', '.hg', '__pycache__', '.venv', 'venv',
  'env', '.env', '.tox', '.mypy_cache', '.pytest_cache', '.idea', '.vscode',
  'site-packages', 'htmlcov', '.eggs', 'tests', 'test',
]);

/** Directories that hold Alembic revision files */
export const MIGRATION_DIR_NAMES = ['migrations', 'alembic'];

// ---------------------------------------------------------------------------
// File utilities
// ---------------------------------------------------------------------------

/**
 * Check if a path exists on the filesystem.
 */
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a UTF-8 file, or undefined when it does not exist.
 */
export async function safeRead(filePath: string): Promise<string | undefined> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
      return undefined;
    }
    throw error;
  }
}

const strictUtf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Decode bytes as UTF-8, keeping a BOM. Null when the bytes are not valid
 * UTF-8.
 */
export function decodeUtf8(bytes: Uint8Array): string | null {
  try {
    return strictUtf8.decode(bytes);
  } catch (error) {
    if (error instanceof TypeError) return null;
    throw error;
  }
}

/**
 * Root-relative POSIX form of an absolute path.
 */
export function toPosixRelative(root: string, absolutePath: string): string {
  return path.relative(root, absolutePath).split(path.sep).join('/');
}

// ---------------------------------------------------------------------------
// Recursive directory walker
// ---------------------------------------------------------------------------

export interface WalkEntry {
  /** Root-relative POSIX path */
  relativePath: string;
  absolutePath: string;
  isDir: boolean;
}

/**
 * Recursively walk a directory, yielding files and subdirectories in sorted
 * order. Directories in SKIP_DIRS, hidden directories and the extra
 * names given are not entered.
 */
export async function walkDir(
  rootDir: string,
  options: { maxDepth?: number; skip?: ReadonlySet<string> } = {}
): Promise<WalkEntry[]> {
  const maxDepth = options.maxDepth ?? 12;
  const results: WalkEntry[] = [];

  async function recurse(dir: string, depth: number): Promise<void> {
    if (depth > maxDepth) return;
    let entries;
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      throw error;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const abs = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (SKIP_DIRS.has(entry.name) || entry.name.startsWith('.') || options.skip?.has(entry.name)) continue;
        results.push({ relativePath: toPosixRelative(rootDir, abs), absolutePath: abs, isDir: true });
        await recurse(abs, depth + 1);
      } else if (entry.isFile()) {
        results.push({ relativePath: toPosixRelative(rootDir, abs), absolutePath: abs, isDir: false });
      }
    }
  }

  await recurse(rootDir, 0);
  return results;
}
