/**
 * Cleanup Scanner - Removes generated "<name>_prompt.txt" files.
 *
 * 1. Collect valid directory names (root name + every visible subdirectory)
 * 2. Find every *_prompt.txt in the whole tree, ignored directories included
 * 3. Delete those whose base name is a valid directory name
 *
 * The first failed delete aborts the batch.
 */

import { rmSync } from 'fs';
import { basename, join } from 'path';
import { IoError, describeError } from '../errors.js';
import { compareNames, isDirectoryPath, listDirectory } from './entries.js';
import { collectDirectoryNames, PROMPT_FILE_SUFFIX } from './dirs.js';
import { compilePatterns, type MatchMode } from './filter.js';
import { resolveRoot } from './root.js';

export interface CleanOptions {
  matchMode?: MatchMode;
  /** Called after each successful delete */
  onRemove?: (filePath: string) => void;
}

export interface CleanResult {
  count: number;
  removed: string[];
}

/**
 * Every file under `dir` whose name ends with "_prompt.txt".
 * Descends into all directories regardless of ignore rules.
 */
export function findPromptFiles(dir: string): string[] {
  const found: string[] = [];

  const names = listDirectory(dir).sort(compareNames);
  for (const name of names) {
    const fullPath = join(dir, name);
    if (isDirectoryPath(fullPath)) {
      found.push(...findPromptFiles(fullPath));
    } else if (name.endsWith(PROMPT_FILE_SUFFIX)) {
      found.push(fullPath);
    }
  }

  return found;
}

/** Base name of a prompt file, e.g. "proj_prompt.txt" -> "proj" */
export function promptBaseName(fileName: string): string | undefined {
  if (!fileName.endsWith(PROMPT_FILE_SUFFIX)) return undefined;
  return fileName.slice(0, -PROMPT_FILE_SUFFIX.length);
}

export function cleanPromptFiles(
  root: string,
  ignoreDirs: readonly string[],
  options: CleanOptions = {}
): CleanResult {
  const { absolutePath, name: rootName } = resolveRoot(root, { canonical: true });
  const dirIgnore = compilePatterns(ignoreDirs, options.matchMode ?? 'name');

  const validNames = collectDirectoryNames(absolutePath, dirIgnore);
  validNames.add(rootName);

  const removed: string[] = [];
  for (const filePath of findPromptFiles(absolutePath)) {
    const base = promptBaseName(basename(filePath));
    if (base === undefined || !validNames.has(base)) continue;

    try {
      rmSync(filePath);
    } catch (error) {
      throw new IoError(`Failed to remove ${filePath}: ${describeError(error)}`, filePath, { cause: error });
    }

    removed.push(filePath);
    options.onRemove?.(filePath);
  }

  return { count: removed.length, removed };
}
