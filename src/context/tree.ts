/**
 * Directory Tree Walker - Renders the visible part of a directory as a
 * box-drawing tree and collects the relative paths of every visible file.
 */

import { join } from 'path';
import { compareNames, entryKind, joinRelative, listDirectory, type VisibleEntry } from './entries.js';
import { isHiddenEntry, isIgnoredDir, isIgnoredFile, type IgnoreRules } from './filter.js';

export interface WalkResult {
  /** Tree lines, each terminated by "\n" (no root line) */
  tree: string;
  /** Visible files relative to the scan root, in traversal order */
  files: string[];
}

interface TreeItem {
  line: string;
  filePath?: string;
}

/**
 * Visible children of `dirPath`, sorted by code point.
 * Hidden entries and entries matched by the ignore rules are dropped.
 */
export function listVisibleEntries(dirPath: string, relativePrefix: string, rules: IgnoreRules): VisibleEntry[] {
  const visible: VisibleEntry[] = [];

  for (const name of listDirectory(dirPath)) {
    if (isHiddenEntry(name)) continue;

    const relativePath = joinRelative(relativePrefix, name);
    const kind = entryKind(join(dirPath, name));
    const candidate = { name, relativePath };

    if (kind === 'directory' ? isIgnoredDir(rules, candidate) : isIgnoredFile(rules, candidate)) continue;
    visible.push({ name, relativePath, kind });
  }

  return visible.sort((a, b) => compareNames(a.name, b.name));
}

export function walkTree(
  rootAbsolute: string,
  relativePrefix: string,
  indent: string,
  rules: IgnoreRules
): WalkResult {
  let tree = '';
  const files: string[] = [];

  for (const item of treeHelper(rootAbsolute, relativePrefix, indent, rules)) {
    tree += `${item.line}\n`;
    if (item.filePath !== undefined) files.push(item.filePath);
  }

  return { tree, files };
}

/**
 * Full tree for a scan root, starting with the "<rootName>/" line.
 */
export function renderTree(rootAbsolute: string, rootName: string, rules: IgnoreRules): WalkResult {
  const { tree, files } = walkTree(rootAbsolute, '', '', rules);
  return { tree: `${rootName}/\n${tree}`, files };
}

function* treeHelper(
  dirPath: string,
  relativePrefix: string,
  prefix: string,
  rules: IgnoreRules
): Generator<TreeItem> {
  const entries = listVisibleEntries(dirPath, relativePrefix, rules);

  for (let i = 0; i < entries.length; i++) {
    const entry = entries[i];
    const isLast = i === entries.length - 1;
    const connector = isLast ? '└── ' : '├── ';
    const childPrefix = isLast ? '    ' : '│   ';

    if (entry.kind === 'directory') {
      yield { line: `${prefix}${connector}${entry.name}/` };
      yield* treeHelper(join(dirPath, entry.name), entry.relativePath, `${prefix}${childPrefix}`, rules);
    } else {
      yield { line: `${prefix}${connector}${entry.name}`, filePath: entry.relativePath };
    }
  }
}
