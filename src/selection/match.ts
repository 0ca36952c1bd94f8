/**
 * Path matchers - pure predicates over root-relative paths.
 * No filesystem access: everything here works on strings only.
 */

import type { SelectionRule } from './rules.js';

const compiled = new Map<string, RegExp>();

function escapeRegex(ch: string): string {
    return '\\^$+?.()|{}[]/'.includes(ch) ? `\\${ch}` : ch;
}

/**
 * Compile a filename glob. `*` and `?` also match a leading dot and never
 * see a `/` since patterns are only tested against the final segment.
 */
export function globToRegex(glob: string): RegExp {
    const cached = compiled.get(glob);
    if (cached) return cached;

    let out = '^';
    for (let i = 0; i < glob.length; i++) {
        const ch = glob[i];

        if (ch === '*') {
            out += '.*';
            continue;
        }
        if (ch === '?') {
            out += '.';
            continue;
        }
        if (ch === '\\' && i + 1 < glob.length) {
            out += escapeRegex(glob[++i]);
            continue;
        }
        if (ch === '[') {
            const negated = glob[i + 1] === '!' || glob[i + 1] === '^';
            const start = i + 1 + (negated ? 1 : 0);
            // A `]` right after `[` or `[!` is a member, not the close
            const close = glob.indexOf(']', start + 1);
            if (close !== -1) {
                const body = glob.slice(start, close);
                out += `[${negated ? '^' : ''}${body.replace(/[\\\]^]/g, '\\$&')}]`;
                i = close;
                continue;
            }
        }
        out += escapeRegex(ch);
    }
    out += '$';

    const regex = new RegExp(out);
    compiled.set(glob, regex);
    return regex;
}

/** Match a single file name against a glob. Case-sensitive. */
export function matchesGlob(fileName: string, pattern: string): boolean {
    return globToRegex(pattern).test(fileName);
}

export function splitSegments(relativePath: string): string[] {
    return relativePath.split(/[/\\]/).filter(seg => seg !== '' && seg !== '.');
}

export function fileNameOf(relativePath: string): string {
    const parts = splitSegments(relativePath);
    return parts.length > 0 ? parts[parts.length - 1] : '';
}

/**
 * True when any whole segment equals a fragment.
 * "old" vetoes "routes/old/c.py" but not "folder123/oldish.py".
 */
export function hasExcludedSegment(relativePath: string, fragments: ReadonlySet<string>): boolean {
    return splitSegments(relativePath).some(seg => fragments.has(seg));
}

/** True when any directory segment (not the file name) is hidden. */
export function hasHiddenDirectory(relativePath: string): boolean {
    const dirs = splitSegments(relativePath).slice(0, -1);
    return dirs.some(seg => seg !== '..' && seg.startsWith('.'));
}

export function hasIncludedExtension(fileName: string, extensions: ReadonlySet<string>): boolean {
    for (const ext of extensions) {
        if (fileName.endsWith(ext)) return true;
    }
    return false;
}

export function matchesExcludedFilename(fileName: string, patterns: readonly string[]): boolean {
    return patterns.some(p => matchesGlob(fileName, p));
}

/**
 * Should a file found under an included directory be selected?
 * Extension is the allow filter; fragments, hidden dirs and name patterns veto.
 */
export function isSelectable(relativePath: string, rule: SelectionRule): boolean {
    const fileName = fileNameOf(relativePath);
    if (!hasIncludedExtension(fileName, rule.includedExtensions)) return false;
    if (hasExcludedSegment(relativePath, rule.excludedPathFragments)) return false;
    if (rule.excludeHiddenDirectories && hasHiddenDirectory(relativePath)) return false;
    if (matchesExcludedFilename(fileName, rule.excludedFilenamePatterns)) return false;
    return true;
}

/**
 * Should the walker descend into a directory with this name?
 * Only prunes what isSelectable() would veto anyway.
 */
export function shouldPruneDir(dirName: string, rule: SelectionRule): boolean {
    if (rule.excludedPathFragments.has(dirName)) return true;
    if (rule.excludeHiddenDirectories && dirName.startsWith('.') && dirName !== '.' && dirName !== '..') return true;
    return false;
}
