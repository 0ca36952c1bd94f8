/**
 * Environment toggles. An unset variable leaves the lower layer's value alone.
 */

import { parseToggle, type Toggles } from '../selection/rules.js';

export const TOGGLE_ENV_VARS: ReadonlyArray<readonly [keyof Toggles, string]> = [
    ['includeDocs', 'INCLUDE_DOCS'],
    ['includeTests', 'INCLUDE_TESTS'],
    ['includeArtProcessing', 'INCLUDE_ART_PROCESSING'],
    ['listOnly', 'LIST_ONLY'],
];

export function readEnvToggles(env: NodeJS.ProcessEnv = process.env): Partial<Toggles> {
    const toggles: Partial<Toggles> = {};

    for (const [key, name] of TOGGLE_ENV_VARS) {
        const value = env[name];
        if (value !== undefined) toggles[key] = parseToggle(value);
    }

    return toggles;
}
