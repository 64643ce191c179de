/**
 * File Mover
 *
 * Moves classified entries into <root>/<category>/, renaming on collision,
 * then removes the directories the move left empty.
 */

import { access, cp, mkdir, readdir, rename, rm, rmdir } from 'node:fs/promises';
import { basename, dirname, extname, join, posix } from 'node:path';
import type { ClassificationMap } from '../../types/index.js';
import { errors, type FileOrganizerError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { loadIgnorePatterns } from './file-walker.js';

export interface MoveOptions {
  /** Plan the moves without touching the filesystem */
  dryRun?: boolean;
  /** Extra gitignore-style patterns the cleanup must leave alone */
  exclude?: readonly string[];
}

export interface PlannedMove {
  /** Relative source path */
  from: string;
  /** Relative destination path */
  to: string;
  category: string;
}

export interface SkippedMove {
  path: string;
  reason: 'missing' | 'in-place';
}

export interface FailedMove {
  path: string;
  error: FileOrganizerError;
}

export interface MoveSummary {
  moved: PlannedMove[];
  skipped: SkippedMove[];
  failed: FailedMove[];
  /** Relative paths of directories removed because they were empty */
  removedDirectories: string[];
}

const INVALID_NAME_CHARS = /[<>:"/\\|?*\u0000-\u001f]/g;

/**
 * Turn a category name into a safe single directory name
 */
export function sanitizeCategoryName(category: string): string {
  const cleaned = category.trim().replace(INVALID_NAME_CHARS, '_');
  if (cleaned === '' || cleaned === '.' || cleaned === '..') {
    return '_';
  }
  return cleaned;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Smallest `<base>_<n><ext>` (n >= 1) not taken on disk or by this run
 */
async function freeDestination(root: string, relativeDir: string, name: string, taken: Set<string>): Promise<string> {
  const ext = extname(name);
  const base = ext ? name.slice(0, -ext.length) : name;

  let candidate = posix.join(relativeDir, name);
  for (let n = 1; taken.has(candidate) || (await pathExists(join(root, candidate))); n++) {
    candidate = posix.join(relativeDir, `${base}_${n}${ext}`);
  }
  return candidate;
}

async function moveEntry(source: string, destination: string): Promise<void> {
  await mkdir(dirname(destination), { recursive: true });
  try {
    await rename(source, destination);
  } catch (error) {
    if (!hasCode(error, 'EXDEV')) throw error;
    await cp(source, destination, { recursive: true, errorOnExist: true, force: false });
    await rm(source, { recursive: true, force: true });
  }
}

/**
 * Remove empty directories below root, deepest first, repeating until a
 * pass removes nothing. The root itself is kept, and directories the walker
 * skips (.git, node_modules, ignore files, `exclude`) are not entered.
 */
export async function removeEmptyDirectories(root: string, exclude: readonly string[] = []): Promise<string[]> {
  const ig = await loadIgnorePatterns(root, exclude);
  const removed: string[] = [];

  const sweep = async (dir: string, relativeDir: string): Promise<boolean> => {
    let removedAny = false;
    const entries = await readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const childRelative = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (ig.ignores(`${childRelative}/`)) continue;
      const child = join(dir, entry.name);

      if (await sweep(child, childRelative)) removedAny = true;

      if ((await readdir(child)).length === 0) {
        await rmdir(child);
        removed.push(childRelative);
        removedAny = true;
      }
    }
    return removedAny;
  };

  while (await sweep(root, '')) {
    // repeat until stable
  }

  return removed;
}

/**
 * Move every classified entry into its category directory
 */
export async function moveClassifiedFiles(
  root: string,
  classification: ClassificationMap,
  options: MoveOptions = {}
): Promise<MoveSummary> {
  const summary: MoveSummary = { moved: [], skipped: [], failed: [], removedDirectories: [] };
  const taken = new Set<string>();

  for (const [category, files] of classification) {
    const directory = sanitizeCategoryName(category);

    for (const file of files) {
      const source = join(root, file.path);

      const inPlace = posix.dirname(file.path) === directory || (file.isDirectory === true && file.path === directory);
      if (inPlace) {
        summary.skipped.push({ path: file.path, reason: 'in-place' });
        taken.add(file.path);
        continue;
      }

      if (!(await pathExists(source))) {
        logger.warning(`Skipping ${file.path}: it no longer exists`);
        summary.skipped.push({ path: file.path, reason: 'missing' });
        continue;
      }

      const to = await freeDestination(root, directory, basename(file.path), taken);
      taken.add(to);
      const planned: PlannedMove = { from: file.path, to, category };

      if (options.dryRun) {
        logger.move(`${file.path} -> ${to} (dry run)`);
        summary.moved.push(planned);
        continue;
      }

      try {
        await moveEntry(source, join(root, to));
        logger.move(`${file.path} -> ${to}`);
        summary.moved.push(planned);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.error(`Failed to move ${file.path}: ${reason}`);
        summary.failed.push({ path: file.path, error: errors.fileMoveFailed(file.path, reason) });
      }
    }
  }

  if (!options.dryRun) {
    summary.removedDirectories = await removeEmptyDirectories(root, options.exclude);
    for (const dir of summary.removedDirectories) {
      logger.debug(`Removed empty directory ${dir}`);
    }
  }

  return summary;
}
