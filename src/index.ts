export * from './engine/index.js';
export * from './interfaces/index.js';
export * from './driver/index.js';
export { loadConfig, applyOverride, DEFAULT_CONFIG_FILE, type LoadConfigOptions } from './config/loader.js';
export { loadManifest, DEFAULT_MANIFEST } from './suite/manifest.js';
export { ResultStore, DEFAULT_RESULTS_DIR, type RunListItem } from './store/result-store.js';
export { createLogger, setLogLevel, getLogLevel, type Logger, type LogLevel } from './utils/logger.js';
