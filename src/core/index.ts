// Core module exports

// Simple index
export * from './simple-index';

// Harness
export * from './harness';

// Config
export { ConfigManager, getConfigManager, DEFAULT_SETTINGS, SettingsSchema, isSettingKey } from './config';
export type { Settings, SettingKey } from './config';

// Errors
export * from './errors';

// Shared utilities
export * from './shared/package-name';
