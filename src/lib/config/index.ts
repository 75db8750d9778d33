// Path: src/lib/config/index.ts
// Public API for the settings module

export type { EngineSettings, HealthSettings } from './types.js';
export { DEFAULT_SETTINGS } from './types.js';

export { loadSettings, mergeSettings, applyEnvOverrides, resolveServerHost, getSettingsPath } from './loader.js';
export { validateSettings } from './validate.js';
export { getConfigDir, getConfigFile } from './storage.js';
