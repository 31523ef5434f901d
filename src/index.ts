export * from './lib/accounting/index.js';
export * from './lib/usage-file.js';
export * from './lib/groups.js';
export * from './lib/monthly.js';
export { loadConfig, getDefaultConfig, type TopusersConfig } from './lib/config.js';
