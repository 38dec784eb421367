/**
 * Prompt Builder - Full pipeline:
 *
 * 1. Resolve and validate the scan root
 * 2. Compile ignore lists (directories, files, extensions)
 * 3. Collect directory names so earlier "<name>_prompt.txt" outputs are never read back in
 * 4. Walk the tree, rendering it and collecting visible files
 * 5. Read files and assemble the document (or stop at the tree)
 */

import { collectDirectoryNames, promptFileNames } from './dirs.js';
import { compileIgnoreRules, type IgnoreRules, type MatchMode } from './filter.js';
import { assembleSelected, selectFiles } from './reader.js';
import { resolveRoot } from './root.js';
import { renderTree } from './tree.js';

export interface PromptOptions {
  /** Directory to scan */
  root: string;
  /** Only include files whose relative path ends with one of these */
  filters?: readonly string[];
  /** Directory names or globs to skip */
  ignoreDirs?: readonly string[];
  /** File names, extensions or globs to skip */
  ignoreFiles?: readonly string[];
  /** Return only the rendered tree */
  treeOnly?: boolean;
  /** What ignore globs are matched against (default: name) */
  matchMode?: MatchMode;
  /** Render .ipynb files cell by cell */
  notebooks?: boolean;
  /** Verbose logging */
  verbose?: boolean;
}

export interface PromptResult {
  /** The prompt document, or just the tree in tree-only mode */
  document: string;
  /** Rendered tree including the "<rootName>/" line */
  tree: string;
  rootName: string;
  rootPath: string;
  /** Every visible file, relative to the root */
  files: string[];
  /** Files whose contents went into the document */
  includedFiles: string[];
  timing: {
    treeMs: number;
    assembleMs: number;
    totalMs: number;
  };
}

export function buildPromptDocument(options: PromptOptions): PromptResult {
  const totalStart = Date.now();
  const { verbose = false, treeOnly = false, filters = [] } = options;

  // ── Step 1: Root ─────────────────────────────────────────────────────────
  const { absolutePath: rootPath, name: rootName } = resolveRoot(options.root);

  // ── Step 2: Ignore rules ─────────────────────────────────────────────────
  const baseRules = compileIgnoreRules({
    dirs: options.ignoreDirs,
    files: options.ignoreFiles,
    mode: options.matchMode,
  });

  // ── Step 3: Exclude earlier outputs ──────────────────────────────────────
  const dirNames = collectDirectoryNames(rootPath, baseRules.dirs);
  dirNames.add(rootName);
  const rules: IgnoreRules = { ...baseRules, exactFileNames: promptFileNames(dirNames) };

  // ── Step 4: Walk ─────────────────────────────────────────────────────────
  const treeStart = Date.now();
  const { tree, files } = renderTree(rootPath, rootName, rules);
  const treeMs = Date.now() - treeStart;

  if (verbose) {
    console.log(`  Tree generated in ${treeMs}ms (${tree.split('\n').length - 1} lines, ${files.length} files)`);
    console.log(`  Auto-excluded outputs: ${[...dirNames].sort().map(n => `${n}_prompt.txt`).join(', ')}`);
  }

  if (treeOnly) {
    return {
      document: tree,
      tree,
      rootName,
      rootPath,
      files,
      includedFiles: [],
      timing: { treeMs, assembleMs: 0, totalMs: Date.now() - totalStart },
    };
  }

  // ── Step 5: Assemble ─────────────────────────────────────────────────────
  const assembleStart = Date.now();
  const includedFiles = selectFiles(files, filters);
  const document = assembleSelected(tree, includedFiles, rootPath, { notebooks: options.notebooks });
  const assembleMs = Date.now() - assembleStart;

  if (verbose) {
    if (filters.length > 0) {
      console.log(`  Filters: ${filters.join(', ')} matched ${includedFiles.length} of ${files.length} files`);
    }
    console.log(`  Read ${includedFiles.length} files (${(Buffer.byteLength(document, 'utf-8') / 1024).toFixed(1)}KB) in ${assembleMs}ms`);
  }

  return {
    document,
    tree,
    rootName,
    rootPath,
    files,
    includedFiles,
    timing: { treeMs, assembleMs, totalMs: Date.now() - totalStart },
  };
}
