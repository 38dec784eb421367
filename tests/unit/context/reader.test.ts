import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  assemblePrompt,
  assembleSelected,
  readFileContent,
  renderNotebook,
  selectFiles,
  EMPTY_FILE,
  UNREADABLE_FILE,
} from '../../../src/context/index.js';

const NOTEBOOK = JSON.stringify({
  cells: [
    { cell_type: 'code', source: ['x = 1\n', 'print(x)'] },
    { cell_type: 'markdown', source: '# Title' },
  ],
});

const RENDERED_NOTEBOOK =
  '---------- Cell 1 (code) ----------\nx = 1\nprint(x)\n\n' +
  '---------- Cell 2 (markdown) ----------\n# Title\n\n';

describe('readFileContent', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'treeprompt-reader-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('returns text content unchanged', () => {
    writeFileSync(join(dir, 'a.txt'), 'hello\n');
    expect(readFileContent(join(dir, 'a.txt'))).toBe('hello\n');
  });

  it('replaces empty and whitespace-only content', () => {
    writeFileSync(join(dir, 'empty.txt'), '');
    writeFileSync(join(dir, 'blank.txt'), '  \n\t\n');
    expect(readFileContent(join(dir, 'empty.txt'))).toBe(EMPTY_FILE);
    expect(readFileContent(join(dir, 'blank.txt'))).toBe(EMPTY_FILE);
  });

  it('replaces content that is not valid UTF-8', () => {
    writeFileSync(join(dir, 'logo.dat'), Buffer.from([0xff, 0xfe, 0x00, 0x81]));
    expect(readFileContent(join(dir, 'logo.dat'))).toBe(UNREADABLE_FILE);
  });

  it('replaces files that cannot be read', () => {
    expect(readFileContent(join(dir, 'missing.txt'))).toBe(UNREADABLE_FILE);
  });

  it('renders notebooks only when asked', () => {
    writeFileSync(join(dir, 'nb.ipynb'), NOTEBOOK);
    expect(readFileContent(join(dir, 'nb.ipynb'), { notebooks: true })).toBe(RENDERED_NOTEBOOK);
    expect(readFileContent(join(dir, 'nb.ipynb'))).toBe(NOTEBOOK);
  });

  it('falls back to the placeholder for malformed notebooks', () => {
    writeFileSync(join(dir, 'bad.ipynb'), '{ not json');
    expect(readFileContent(join(dir, 'bad.ipynb'), { notebooks: true })).toBe(UNREADABLE_FILE);
  });
});

describe('renderNotebook', () => {
  it('renders cells in order', () => {
    expect(renderNotebook(NOTEBOOK)).toBe(RENDERED_NOTEBOOK);
  });

  it('rejects JSON without a cells array', () => {
    expect(renderNotebook('{"metadata": {}}')).toBeUndefined();
    expect(renderNotebook('{"cells": [{"cell_type": "code", "source": 3}]}')).toBeUndefined();
  });
});

describe('selectFiles', () => {
  const files = ['src/a.py', 'b.rs', 'c.py', 'README.md'];

  it('keeps every file without filters', () => {
    expect(selectFiles(files, [])).toEqual(files);
  });

  it('keeps files whose path ends with a filter', () => {
    expect(selectFiles(files, ['.py'])).toEqual(['src/a.py', 'c.py']);
    expect(selectFiles(files, ['py', 'rs'])).toEqual(['src/a.py', 'b.rs', 'c.py']);
  });

  it('matches plain suffixes, not extensions', () => {
    expect(selectFiles(files, ['a.py'])).toEqual(['src/a.py']);
    expect(selectFiles(files, ['ME.md'])).toEqual(['README.md']);
  });
});

describe('assemblePrompt', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'treeprompt-assemble-'));
    writeFileSync(join(dir, 'a.txt'), 'hi');
    writeFileSync(join(dir, 'b.md'), ' ');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('wraps the tree and every file block', () => {
    const tree = 'proj/\n├── a.txt\n└── b.md\n';
    const doc = assemblePrompt(tree, ['a.txt', 'b.md'], [], dir);

    expect(doc).toBe(
      '<context>\n<directory_tree>\nproj/\n├── a.txt\n└── b.md\n</directory_tree>\n\n<files>\n\n' +
      '<file>\n<path>a.txt</path>\n<content>\nhi\n</content>\n</file>\n\n' +
      '<file>\n<path>b.md</path>\n<content>\nEMPTY FILE\n</content>\n</file>\n\n' +
      '</files>\n</context>'
    );
  });

  it('skips files that do not match the filters', () => {
    const doc = assemblePrompt('proj/\n', ['a.txt', 'b.md'], ['.md'], dir);
    expect(doc).not.toContain('<path>a.txt</path>');
    expect(doc).toContain('<path>b.md</path>');
  });

  it('renders an already-filtered list as given', () => {
    const tree = 'proj/\n├── a.txt\n└── b.md\n';

    expect(assembleSelected(tree, ['b.md'], dir)).toBe(assemblePrompt(tree, ['a.txt', 'b.md'], ['.md'], dir));
    expect(assembleSelected(tree, ['b.md', 'a.txt'], dir)).toBe(
      '<context>\n<directory_tree>\nproj/\n├── a.txt\n└── b.md\n</directory_tree>\n\n<files>\n\n' +
      '<file>\n<path>b.md</path>\n<content>\nEMPTY FILE\n</content>\n</file>\n\n' +
      '<file>\n<path>a.txt</path>\n<content>\nhi\n</content>\n</file>\n\n' +
      '</files>\n</context>'
    );
  });

  it('renders an empty files section when nothing matches', () => {
    expect(assemblePrompt('proj/\n', [], [], dir)).toBe(
      '<context>\n<directory_tree>\nproj/\n</directory_tree>\n\n<files>\n\n</files>\n</context>'
    );
  });
});
