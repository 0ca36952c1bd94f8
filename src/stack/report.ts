/**
 * Listing Reporter - dry-run view of a selection. Writes nothing.
 */

import type { SelectionResult } from '../selection/engine.js';

export function formatListing(selection: SelectionResult): string {
    const lines: string[] = [];

    lines.push(`Would include (${selection.directoryFiles.length} files):`);
    for (const file of selection.directoryFiles) lines.push(`  ${file}`);

    lines.push('');
    lines.push(`Root files (${selection.rootFiles.length}):`);
    for (const file of selection.rootFiles) lines.push(`  ${file}`);

    return lines.join('\n');
}
