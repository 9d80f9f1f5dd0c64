import type { RecollConfig } from '../config.js';

/**
 * バリデーション済みの設定ファイルの内容（未指定の項目は欠ける）
 */
export interface ValidatedConfig {
  version?: string;
  recoll?: Partial<RecollConfig>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): ValidatedConfig {
  if (!isRecord(config)) {
    throw new Error('Config must be an object');
  }

  const result: ValidatedConfig = {};

  // バージョンのチェック
  if (config.version !== undefined) {
    if (typeof config.version !== 'string') {
      throw new Error('config.version must be a string');
    }
    result.version = config.version;
  }

  // recoll設定のバリデーション
  if (config.recoll !== undefined) {
    result.recoll = validateRecollConfig(config.recoll);
  }

  return result;
}

function validateRecollConfig(recoll: unknown): Partial<RecollConfig> {
  if (!isRecord(recoll)) {
    throw new Error('config.recoll must be an object');
  }

  const out: Partial<RecollConfig> = {};

  for (const key of ['confDir', 'dbDir', 'command', 'stemLanguage'] as const) {
    const value = recoll[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new Error(`config.recoll.${key} must be a non-empty string`);
    }
    out[key] = value;
  }

  const pageSize = recoll.pageSize;
  if (pageSize !== undefined) {
    if (typeof pageSize !== 'number' || !Number.isInteger(pageSize) || pageSize < 1) {
      throw new Error('config.recoll.pageSize must be a positive integer');
    }
    out.pageSize = pageSize;
  }

  return out;
}
