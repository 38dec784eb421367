import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { basename, join, resolve } from 'path';
import { tmpdir } from 'os';
import { resolveOutputPath, temporaryPathFor, writeFileAtomic } from '../../../src/output/writer.js';
import { IoError } from '../../../src/errors.js';

describe('resolveOutputPath', () => {
  it('appends .txt to the file name', () => {
    expect(resolveOutputPath('/tmp/out', 'proj_prompt')).toBe('/tmp/out/proj_prompt.txt');
  });

  it('resolves relative output directories', () => {
    expect(resolveOutputPath('.', 'notes')).toBe(resolve('notes.txt'));
  });
});

describe('temporaryPathFor', () => {
  it('places a hidden sibling next to the target', () => {
    const temp = temporaryPathFor('/tmp/out/out.txt');
    expect(temp.startsWith('/tmp/out/')).toBe(true);
    expect(basename(temp)).toMatch(/^\.out\.txt\.[A-Za-z0-9_-]{8}\.tmp$/);
  });

  it('uses a new name each time', () => {
    expect(temporaryPathFor('/tmp/a.txt')).not.toBe(temporaryPathFor('/tmp/a.txt'));
  });
});

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'treeprompt-writer-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes the contents and leaves no temporary file', () => {
    const target = join(dir, 'out.txt');

    writeFileAtomic(target, 'hello ✓');

    expect(readFileSync(target, 'utf-8')).toBe('hello ✓');
    expect(readdirSync(dir)).toEqual(['out.txt']);
  });

  it('replaces an existing file', () => {
    const target = join(dir, 'out.txt');
    writeFileSync(target, 'old contents that are longer');

    writeFileAtomic(target, 'new');

    expect(readFileSync(target, 'utf-8')).toBe('new');
  });

  it('throws IoError when the directory is missing', () => {
    const target = join(dir, 'missing', 'out.txt');

    expect(() => writeFileAtomic(target, 'x')).toThrow(IoError);
    expect(() => writeFileAtomic(target, 'x')).toThrow(`Failed to write ${target}`);
    expect(readdirSync(dir)).toEqual([]);
  });
});
