export { settingsEnvSchema } from './schema.js';
export type { SettingsEnv } from './schema.js';
export { isDev, loadSettings } from './loader.js';
export type { Settings } from './loader.js';
