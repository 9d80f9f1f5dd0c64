export { ConfigLoader, type ResolveConfigOptions, type ResolvedConfig } from './loader.js';
export { validateConfig, type ValidatedConfig } from './validator.js';
