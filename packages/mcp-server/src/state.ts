/**
 * インデックス接続状態
 *
 * 起動時に1回だけ判定し、失敗しても再接続はしない。
 */

import { connectIndex, type RecollqConnectionOptions } from '@recoll-search/client';
import type { IndexConnection, RecollConfig } from '@recoll-search/types';
import { debugLog, errorLog } from './logger.js';

/**
 * インデックス接続状態
 */
export type IndexState =
  | { status: 'connected'; connection: IndexConnection }
  | { status: 'unavailable'; reason: string };

/**
 * 接続できなかった場合に検索系ツールが返す固定メッセージ
 */
export const INDEX_UNAVAILABLE_MESSAGE = 'Error: Recoll database not available. Check configuration.';

/**
 * 接続関数（テスト用に差し替え可能）
 */
export type IndexConnector = (options: RecollqConnectionOptions) => Promise<IndexConnection>;

/**
 * 設定からインデックスに接続し、状態を返す
 *
 * 失敗はrejectせず unavailable として返す。
 */
export async function detectIndexState(
  config: RecollConfig,
  connect: IndexConnector = connectIndex
): Promise<IndexState> {
  debugLog(`Connecting to Recoll index (confdir: ${config.confDir})`);

  try {
    const connection = await connect({
      confDir: config.confDir,
      dbDir: config.dbDir,
      command: config.command,
      pageSize: config.pageSize,
      stemLanguage: config.stemLanguage,
    });
    debugLog('Recoll index connected');
    return { status: 'connected', connection };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    errorLog(`Warning: Could not connect to Recoll database: ${reason}`);
    return { status: 'unavailable', reason };
  }
}
