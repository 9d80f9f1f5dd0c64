/**
 * コマンドライン引数
 */

import { Command } from 'commander';
import * as path from 'path';

/**
 * CLIオプション
 */
export interface CLIOptions {
  /** 設定ファイルパス（絶対パスに解決済み） */
  config?: string;
  /** Recoll設定ディレクトリ（絶対パスに解決済み） */
  confDir?: string;
}

/**
 * コマンドライン引数を解析
 * @param argv process.argv 形式（先頭2要素はnodeとスクリプト）
 */
export function parseArgs(argv: string[], version: string): CLIOptions {
  const program = new Command();

  program
    .name('recoll-search-mcp')
    .description('MCP Server exposing a Recoll full-text index')
    .version(version)
    .option('-c, --config <path>', 'Config file path (default: auto-detect .recoll-search.json)')
    .option('--confdir <path>', 'Recoll configuration directory (overrides RECOLL_CONFDIR)')
    .parse(argv);

  const options = program.opts<{ config?: string; confdir?: string }>();

  return {
    config: options.config ? path.resolve(options.config) : undefined,
    confDir: options.confdir ? path.resolve(options.confdir) : undefined,
  };
}
