export { loadConfig, parseConfig, applyEnvOverrides, ConfigError, DEFAULT_CONFIG_PATH } from './config';
export type { AppConfig } from './config';
