export { buildPromptDocument } from './gather.js';
export type { PromptOptions, PromptResult } from './gather.js';

// Root validation
export { resolveRoot } from './root.js';
export type { ResolvedRoot } from './root.js';

// File reading + assembly
export { assemblePrompt, assembleSelected, readFileContent, renderNotebook, selectFiles, EMPTY_FILE, UNREADABLE_FILE } from './reader.js';
export type { ReadOptions } from './reader.js';

// Tree walking
export { walkTree, renderTree, listVisibleEntries } from './tree.js';
export type { WalkResult } from './tree.js';
export { compareNames } from './entries.js';
export type { VisibleEntry, EntryKind } from './entries.js';

// Directory names + cleanup
export { collectDirectoryNames, promptFileNames, PROMPT_FILE_SUFFIX } from './dirs.js';
export { cleanPromptFiles, findPromptFiles, promptBaseName } from './clean.js';
export type { CleanOptions, CleanResult } from './clean.js';

// Filtering
export {
  compilePattern,
  compilePatterns,
  compileExtensions,
  compileIgnoreRules,
  matchesPattern,
  matchesAny,
  extensionOf,
  isHiddenEntry,
  isIgnoredDir,
  isIgnoredFile,
  isMatchMode,
  MATCH_MODES,
} from './filter.js';
export type { MatchMode, MatchCandidate, CompiledPattern, IgnoreRules } from './filter.js';
