/**
 * Selection Engine - decides which files of a repository belong in a stack.
 *
 * Directories are visited in configured order; each directory's matches are
 * sorted on their own, so the result is "directory order, then path order",
 * not one global sort. Root files keep their configured order.
 *
 * The engine only lists: it never reads contents, writes or logs.
 */

import { existsSync, readdirSync, statSync } from 'fs';
import { isAbsolute, join, relative, resolve, sep } from 'path';
import { ConfigurationError } from './errors.js';
import { isSelectable, shouldPruneDir } from './match.js';
import type { SelectionRule } from './rules.js';

export interface SelectionResult {
    /** Files found under included directories, root-relative with "/" separators */
    directoryFiles: string[];
    /** Explicit root files that exist, in configured order */
    rootFiles: string[];
}

/** Plain code-unit order; independent of locale so outputs diff cleanly. */
export function comparePaths(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}

function toPosix(relPath: string): string {
    return sep === '/' ? relPath : relPath.split(sep).join('/');
}

/** Root-relative path, or undefined when `target` lies outside the root. */
function insideRoot(root: string, target: string): string | undefined {
    const rel = relative(root, target);
    if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) return undefined;
    return toPosix(rel);
}

function isDirectory(path: string): boolean {
    try {
        return statSync(path).isDirectory();
    } catch {
        return false;
    }
}

/**
 * Resolve the root and make sure it is a directory.
 */
export function validateRoot(rootPath: string): string {
    const abs = resolve(rootPath);

    if (!existsSync(abs)) {
        throw new ConfigurationError(`Root path does not exist: ${rootPath}\nResolved to: ${abs}`, abs);
    }
    if (!statSync(abs).isDirectory()) {
        throw new ConfigurationError(`Root path is not a directory: ${rootPath}\nResolved to: ${abs}`, abs);
    }

    return abs;
}

function walkDir(currentPath: string, root: string, rule: SelectionRule, out: string[]): void {
    let entries;
    try {
        entries = readdirSync(currentPath, { withFileTypes: true });
    } catch {
        // Vanished or unreadable since the parent was listed
        return;
    }

    for (const entry of entries) {
        const fullPath = join(currentPath, entry.name);

        if (entry.isDirectory()) {
            if (shouldPruneDir(entry.name, rule)) continue;
            walkDir(fullPath, root, rule, out);
            continue;
        }

        // Regular files only; symlinks are neither followed nor collected
        if (!entry.isFile()) continue;

        const relPath = insideRoot(root, fullPath);
        if (relPath !== undefined && isSelectable(relPath, rule)) {
            out.push(relPath);
        }
    }
}

/**
 * Run one selection over `rootPath`.
 * Throws ConfigurationError for a bad root; zero matches is an empty result.
 */
export function selectFiles(rootPath: string, rule: SelectionRule): SelectionResult {
    const root = validateRoot(rootPath);

    const directoryFiles: string[] = [];
    for (const dir of rule.includedDirectories) {
        const abs = resolve(root, dir);
        if ((abs !== root && insideRoot(root, abs) === undefined) || !isDirectory(abs)) continue;

        const found: string[] = [];
        walkDir(abs, root, rule, found);
        found.sort(comparePaths);
        directoryFiles.push(...found);
    }

    const rootFiles: string[] = [];
    for (const file of rule.rootFiles) {
        const abs = resolve(root, file);
        const relPath = insideRoot(root, abs);
        if (relPath === undefined) continue;

        try {
            if (statSync(abs).isFile()) rootFiles.push(relPath);
        } catch {
            continue;
        }
    }

    return { directoryFiles, rootFiles };
}
