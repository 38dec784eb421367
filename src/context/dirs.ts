/**
 * Directory Name Collector - names (not paths) of every visible subdirectory.
 *
 * Ignored and hidden directories are not descended into, so a directory that
 * is only reachable through an ignored ancestor contributes no name.
 */

import { join } from 'path';
import { isDirectoryPath, joinRelative, listDirectory } from './entries.js';
import { isHiddenEntry, matchesAny, type CompiledPattern } from './filter.js';

export function collectDirectoryNames(root: string, dirIgnore: readonly CompiledPattern[]): Set<string> {
  const names = new Set<string>();
  collectInto(root, '', dirIgnore, names);
  return names;
}

/** "<name>_prompt.txt" for every name, the file each generation run writes by default */
export function promptFileNames(dirNames: Iterable<string>): Set<string> {
  const fileNames = new Set<string>();
  for (const name of dirNames) fileNames.add(`${name}${PROMPT_FILE_SUFFIX}`);
  return fileNames;
}

export const PROMPT_FILE_SUFFIX = '_prompt.txt';

function collectInto(
  dirPath: string,
  relativePrefix: string,
  dirIgnore: readonly CompiledPattern[],
  names: Set<string>
): void {
  for (const name of listDirectory(dirPath)) {
    if (isHiddenEntry(name)) continue;

    const absolutePath = join(dirPath, name);
    if (!isDirectoryPath(absolutePath)) continue;

    const relativePath = joinRelative(relativePrefix, name);
    if (matchesAny(dirIgnore, { name, relativePath })) continue;

    names.add(name);
    collectInto(absolutePath, relativePath, dirIgnore, names);
  }
}
