/**
 * @recoll-search/types
 * recoll-searchの共通型定義
 */

// Index
export type { IndexHit } from './hit.js';
export type { IndexConnection, IndexQuery } from './connection.js';

// Envelope
export type {
  DocumentHit,
  SearchEnvelope,
  RecentFilesEnvelope,
  ContentEnvelope,
} from './envelope.js';

// Config
export type { RecollSearchConfig, RecollConfig } from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
  type ValidatedConfig,
} from './config/index.js';
