#!/usr/bin/env tsx
/**
 * recoll-search MCP Server
 * Recollでインデックスしたファイルシステムを検索するためのMCPサーバ
 */

import { createRequire } from 'module';
import { ConfigLoader } from '@recoll-search/types';
import { parseArgs } from './args.js';
import { Dispatcher } from './dispatcher.js';
import { debugLog, errorLog } from './logger.js';
import { createMcpServer, startServer } from './protocol.js';
import { detectIndexState } from './state.js';

// package.jsonからバージョンを読み込む
const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };
const VERSION = packageJson.version;

/**
 * メイン処理
 */
async function main() {
  const options = parseArgs(process.argv, VERSION);

  // 設定読み込み
  const { config, configPath } = await ConfigLoader.resolve({
    configPath: options.config,
    confDir: options.confDir,
  });
  debugLog(`Config: ${configPath ?? '(defaults)'}`);
  debugLog(`Recoll confdir: ${config.recoll.confDir}`);

  // インデックス接続（失敗してもサーバは起動する）
  const indexState = await detectIndexState(config.recoll);
  debugLog(`Index state: ${indexState.status}`);

  const dispatcher = new Dispatcher(indexState);
  const server = createMcpServer(dispatcher, { name: 'recoll-search', version: VERSION });

  await startServer(server);
}

main().catch((error: unknown) => {
  errorLog('Server error:', error);
  process.exit(1);
});
