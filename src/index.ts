export * from './selection/index.js';
export * from './stack/index.js';

// Configuration
export { loadConfig, CONFIG_TEMPLATE } from './config/config.js';
export type { StackerConfig } from './config/config.js';
export { readEnvToggles, TOGGLE_ENV_VARS } from './config/env.js';
export { overridesFromCli, resolveSettings } from './config/settings.js';
export type { CliOptions, CliOverrides, StackerSettings, SettingsLayers } from './config/settings.js';
