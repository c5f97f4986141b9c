export { ConfigLoader, CONFIG_FILE_NAMES, type ResolveConfigOptions, type ResolvedConfig } from './loader.js';
export { validateConfig } from './validator.js';
