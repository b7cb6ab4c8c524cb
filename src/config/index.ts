export { loadConfig } from './defaults';
export { loadDigestConfig, CONFIG_DEFAULTS, CONFIG_FILE_NAME } from './loader';
export type { ConfigWarning, LoadConfigResult } from './loader';
export { digestConfigSchema } from './schema';
