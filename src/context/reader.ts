/**
 * File Reader - Reads collected files and stitches them, with the tree, into
 * the prompt document.
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import { TextDecoder } from 'util';

export const EMPTY_FILE = 'EMPTY FILE';
export const UNREADABLE_FILE = 'BINARY OR UNREADABLE';

export interface ReadOptions {
    /** Render .ipynb files cell by cell instead of as raw JSON (default: false) */
    notebooks?: boolean;
}

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function cellSource(source: unknown): string | undefined {
    if (typeof source === 'string') return source;
    if (!Array.isArray(source)) return undefined;
    const lines: unknown[] = source;
    return lines.every((line): line is string => typeof line === 'string') ? lines.join('') : undefined;
}

/**
 * Render a Jupyter notebook as a sequence of labelled cells.
 * Returns undefined when the JSON is not a notebook.
 */
export function renderNotebook(json: string): string | undefined {
    let parsed: unknown;
    try {
        parsed = JSON.parse(json);
    } catch {
        return undefined;
    }
    if (!isRecord(parsed) || !Array.isArray(parsed.cells)) return undefined;

    const cells: unknown[] = parsed.cells;
    const sections: string[] = [];
    for (const [i, cell] of cells.entries()) {
        if (!isRecord(cell)) return undefined;
        const source = cellSource(cell.source);
        const cellType = typeof cell.cell_type === 'string' ? cell.cell_type : 'unknown';
        if (source === undefined) return undefined;

        const rule = '-'.repeat(10);
        sections.push(`${rule} Cell ${i + 1} (${cellType}) ${rule}\n${source}\n\n`);
    }
    return sections.join('');
}

/**
 * Read a file as UTF-8 text. Never throws: unreadable or non-UTF-8 content
 * becomes UNREADABLE_FILE, blank content becomes EMPTY_FILE.
 */
export function readFileContent(absolutePath: string, options: ReadOptions = {}): string {
    let content: string;
    try {
        content = utf8.decode(readFileSync(absolutePath));
    } catch {
        return UNREADABLE_FILE;
    }

    if (options.notebooks && absolutePath.endsWith('.ipynb')) {
        const rendered = renderNotebook(content);
        if (rendered === undefined) return UNREADABLE_FILE;
        content = rendered;
    }

    return content.trim() === '' ? EMPTY_FILE : content;
}

/**
 * Files whose relative path ends with one of `filters`. No filters keeps all.
 */
export function selectFiles(files: readonly string[], filters: readonly string[]): string[] {
    if (filters.length === 0) return [...files];
    return files.filter(file => filters.some(suffix => file.endsWith(suffix)));
}

export function formatFileBlock(relativePath: string, content: string): string {
    return `<file>\n<path>${relativePath}</path>\n<content>\n${content}\n</content>\n</file>\n\n`;
}

/**
 * Build the prompt document: tree block followed by one block per file
 * matching `filters`, in traversal order.
 */
export function assemblePrompt(
    tree: string,
    files: readonly string[],
    filters: readonly string[],
    rootAbsolute: string,
    options: ReadOptions = {}
): string {
    return assembleSelected(tree, selectFiles(files, filters), rootAbsolute, options);
}

/** Same document, for a file list that is already filtered */
export function assembleSelected(
    tree: string,
    includedFiles: readonly string[],
    rootAbsolute: string,
    options: ReadOptions = {}
): string {
    const sections: string[] = [
        '<context>\n<directory_tree>\n',
        tree,
        '</directory_tree>\n\n<files>\n\n',
    ];

    for (const relativePath of includedFiles) {
        const content = readFileContent(join(rootAbsolute, relativePath), options);
        sections.push(formatFileBlock(relativePath, content));
    }

    sections.push('</files>\n</context>');
    return sections.join('');
}
