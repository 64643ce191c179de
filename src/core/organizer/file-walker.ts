/**
 * File Walker
 *
 * Lists the entries of the folder being organized as FileRecords with
 * forward-slash paths relative to the root, sorted. Respects .gitignore,
 * .fileorganizerignore and --exclude patterns.
 */

import { readdir, readFile, stat } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import ignoreModule from 'ignore';
import type { FileRecord } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { DEFAULT_CONFIG_FILE } from '../services/config-manager.js';

const ignore = ignoreModule.default;
export type Ignore = ReturnType<typeof ignore>;

export interface FileWalkerOptions {
  /** Walk subdirectories; otherwise list the root's direct entries */
  recursive?: boolean;
  /** Extra gitignore-style patterns to skip */
  exclude?: readonly string[];
}

/**
 * Built-in directories to always skip
 */
const SKIP_DIRECTORIES = new Set(['.git', 'node_modules']);

/**
 * Specific filenames to always skip
 */
const SKIP_FILENAMES = new Set([
  '.DS_Store',
  'Thumbs.db',
  '.gitignore',
  '.fileorganizerignore',
  DEFAULT_CONFIG_FILE,
]);

const IGNORE_FILES = ['.gitignore', '.fileorganizerignore'];

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

/**
 * Load and combine ignore patterns. Directories are matched as `dir/`.
 */
export async function loadIgnorePatterns(rootPath: string, exclude: readonly string[]): Promise<Ignore> {
  const ig = ignore();

  for (const dir of SKIP_DIRECTORIES) {
    ig.add(`${dir}/`);
  }
  for (const filename of SKIP_FILENAMES) {
    ig.add(filename);
  }

  for (const file of IGNORE_FILES) {
    try {
      ig.add(await readFile(join(rootPath, file), 'utf-8'));
    } catch {
      // optional
    }
  }

  ig.add([...exclude]);
  return ig;
}

async function assertDirectory(rootPath: string): Promise<void> {
  try {
    const stats = await stat(rootPath);
    if (stats.isDirectory()) return;
  } catch {
    // reported below
  }
  throw errors.directoryNotFound(rootPath);
}

/**
 * List the files to organize under rootPath
 */
export async function listFiles(rootPath: string, options: FileWalkerOptions = {}): Promise<FileRecord[]> {
  const recursive = options.recursive ?? true;
  await assertDirectory(rootPath);

  const ig = await loadIgnorePatterns(rootPath, options.exclude ?? []);
  const records: FileRecord[] = [];

  const walk = async (dirPath: string): Promise<void> => {
    const entries = await readdir(dirPath, { withFileTypes: true });

    for (const entry of entries) {
      const absolutePath = join(dirPath, entry.name);
      const relativePath = toPosix(relative(rootPath, absolutePath));

      if (entry.isDirectory()) {
        if (ig.ignores(`${relativePath}/`)) continue;
        if (recursive) {
          await walk(absolutePath);
        } else {
          records.push({ path: relativePath, isDirectory: true });
        }
      } else if (entry.isFile()) {
        if (ig.ignores(relativePath)) continue;
        records.push({ path: relativePath });
      } else {
        logger.debug(`Skipping ${relativePath}: not a regular file or directory`);
      }
    }
  };

  await walk(rootPath);

  records.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
  logger.debug(`Found ${records.length} entries under ${rootPath}`);
  return records;
}
