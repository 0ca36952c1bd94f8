/**
 * Stack Writer - Turns a selection into two markdown documents:
 * one for directory files, one for root files.
 *
 * Each section is a rule-delimited header naming the file, then the file's
 * contents verbatim. A file that cannot be read any more is reported in
 * `skipped` and left out; the rest of the run carries on.
 */

import { mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { EmptySelectionError } from '../selection/errors.js';
import type { SelectionResult } from '../selection/engine.js';
import { formatStamp } from './timestamp.js';

export interface SkippedFile {
    path: string;
    reason: string;
}

export interface RenderResult {
    /** The document bytes; file contents are copied byte for byte */
    document: Buffer;
    /** Files that made it into the document */
    included: string[];
    skipped: SkippedFile[];
}

export interface WriteOptions {
    /** Output directory; relative values resolve against the root (default: code-stacks) */
    outDir?: string;
    /** Clock used for titles and file names */
    now?: Date;
}

export interface WriteResult {
    fullStackPath: string;
    rootStackPath: string;
    /** Directory files written */
    fileCount: number;
    /** Root files written */
    rootFileCount: number;
    skipped: SkippedFile[];
}

export const DEFAULT_OUT_DIR = 'code-stacks';

export function formatSectionHeader(relativePath: string): string {
    return `\n\n---\n## ${relativePath}\n---\n`;
}

/**
 * Build one stack document in memory.
 */
export function renderStack(title: string, rootPath: string, files: readonly string[]): RenderResult {
    const sections: Buffer[] = [Buffer.from(`${title}\n`, 'utf-8')];
    const included: string[] = [];
    const skipped: SkippedFile[] = [];

    for (const file of files) {
        let content: Buffer;
        try {
            content = readFileSync(join(rootPath, file));
        } catch {
            skipped.push({ path: file, reason: 'read-error' });
            continue;
        }
        sections.push(Buffer.from(formatSectionHeader(file), 'utf-8'), content);
        included.push(file);
    }

    return { document: Buffer.concat(sections), included, skipped };
}

export function stackPaths(rootPath: string, stamp: string, outDir: string = DEFAULT_OUT_DIR): {
    fullStackPath: string;
    rootStackPath: string;
} {
    const base = resolve(rootPath, outDir);
    return {
        fullStackPath: join(base, 'full-code-stack', `code-stack-${stamp}.md`),
        rootStackPath: join(base, 'root-files-code-stack', `root-files-code-stack-${stamp}.md`),
    };
}

function writeDocument(path: string, document: Buffer): void {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, document);
}

/**
 * Write both stacks for a selection.
 * Throws EmptySelectionError (and writes nothing) when both partitions are empty.
 */
export function writeStacks(rootPath: string, selection: SelectionResult, options: WriteOptions = {}): WriteResult {
    if (selection.directoryFiles.length === 0 && selection.rootFiles.length === 0) {
        throw new EmptySelectionError(rootPath);
    }

    const stamp = formatStamp(options.now);
    const { fullStackPath, rootStackPath } = stackPaths(rootPath, stamp, options.outDir);

    const full = renderStack(`# FULL CODE STACK (${stamp})`, rootPath, selection.directoryFiles);
    const root = renderStack(`# ROOT FILES CODE STACK (${stamp})`, rootPath, selection.rootFiles);

    writeDocument(fullStackPath, full.document);
    writeDocument(rootStackPath, root.document);

    return {
        fullStackPath,
        rootStackPath,
        fileCount: full.included.length,
        rootFileCount: root.included.length,
        skipped: [...full.skipped, ...root.skipped],
    };
}
