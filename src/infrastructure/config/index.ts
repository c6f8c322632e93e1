export { loadConfig, settingsFromEnv } from './load-config.js';
export type { ConfigSources, RawSettings } from './load-config.js';
export { SETTINGS, settingId } from './settings.js';
export type { Setting } from './settings.js';
