/**
 * recollq によるインデックス接続
 *
 * コマンドラインの recollq を起動し、-F（base64フィールド出力）と
 * -n（結果スライス）でページ単位に取得する。
 */

import { access } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { IndexConnection, IndexHit, IndexQuery } from '@recoll-search/types';
import { spawnCommand, type CommandResult, type CommandRunner } from './command-runner.js';
import { IndexConnectError, RecollQueryError } from './errors.js';
import { parseRecollqOutput, parseRecollqPage, RECOLLQ_FIELDS } from './output-parser.js';

/**
 * 接続設定
 */
export interface RecollqConnectionOptions {
  /** Recollの設定ディレクトリ */
  confDir: string;
  /** インデックスDBのディレクトリ（デフォルト: <confDir>/xapiandb） */
  dbDir?: string;
  /** recollq コマンド（デフォルト: recollq） */
  command?: string;
  /** 1ページのヒット数（デフォルト: 100） */
  pageSize?: number;
  /** ステミング言語 */
  stemLanguage?: string;
  /** コマンド実行関数（テスト用に差し替え可能） */
  runner?: CommandRunner;
}

interface QuerySettings {
  confDir: string;
  command: string;
  pageSize: number;
  stemLanguage?: string;
  runner: CommandRunner;
}

/**
 * インデックスに接続
 *
 * 設定ディレクトリとインデックスDBが読めることを確認する。
 *
 * @throws IndexConnectError どちらかが読めない場合
 */
export async function connectIndex(options: RecollqConnectionOptions): Promise<RecollqConnection> {
  const dbDir = options.dbDir ?? path.join(options.confDir, 'xapiandb');

  const targets: Array<[string, string]> = [
    ['configuration directory', options.confDir],
    ['index database', dbDir],
  ];

  for (const [label, dir] of targets) {
    try {
      await access(dir, constants.R_OK);
    } catch (error) {
      throw new IndexConnectError(
        `Recoll ${label} is not readable: ${dir}`,
        error instanceof Error ? error : undefined
      );
    }
  }

  return new RecollqConnection(options);
}

/**
 * recollqを使うインデックス接続
 */
export class RecollqConnection implements IndexConnection {
  private readonly settings: QuerySettings;

  constructor(options: RecollqConnectionOptions) {
    this.settings = {
      confDir: options.confDir,
      command: options.command ?? 'recollq',
      pageSize: options.pageSize ?? 100,
      stemLanguage: options.stemLanguage,
      runner: options.runner ?? spawnCommand,
    };
  }

  newQuery(): RecollqQuery {
    return new RecollqQuery(this.settings);
  }
}

/**
 * 1回分の検索
 *
 * execute() で先頭ページを取得し、fetchNext() はバッファが空になると次のページを取りに行く。
 */
export class RecollqQuery implements IndexQuery {
  private expression: string | null = null;
  private total = 0;
  private buffer: IndexHit[] = [];
  private nextOffset = 0;
  private exhausted = false;

  constructor(private readonly settings: QuerySettings) {}

  async execute(expression: string): Promise<number> {
    this.expression = expression;

    const page = parseRecollqOutput(await this.runPage(expression, 0));
    this.total = page.total;
    this.accept(page.hits);

    return this.total;
  }

  async fetchNext(): Promise<IndexHit | null> {
    if (this.expression === null) {
      throw new RecollQueryError('fetchNext() called before execute()');
    }

    if (this.buffer.length === 0 && !this.exhausted) {
      this.accept(parseRecollqPage(await this.runPage(this.expression, this.nextOffset)));
    }

    return this.buffer.shift() ?? null;
  }

  private accept(hits: IndexHit[]): void {
    this.buffer = hits;
    this.nextOffset += hits.length;

    // 空ページ、または総数に達したら以降は取得しない
    if (hits.length === 0 || this.nextOffset >= this.total) {
      this.exhausted = true;
    }
  }

  /**
   * 1ページ分のrecollqを実行し、標準出力を返す
   */
  private async runPage(expression: string, offset: number): Promise<string> {
    const { command, confDir, pageSize, stemLanguage, runner } = this.settings;

    const args = ['-c', confDir];
    if (stemLanguage) {
      args.push('-s', stemLanguage);
    }
    args.push('-F', RECOLLQ_FIELDS, '-n', `${offset}-${pageSize}`, toQueryArgument(expression));

    let result: CommandResult;
    try {
      result = await runner(command, args);
    } catch (error) {
      throw new RecollQueryError(
        `Failed to run ${command}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || `exit code ${String(result.exitCode)}`;
      throw new RecollQueryError(`${command} failed: ${detail}`, result.exitCode, result.stderr);
    }

    return result.stdout;
  }
}

/**
 * クエリ式をrecollqの引数にする
 *
 * recollqは "-" で始まる引数をオプションとして読み、"--" も受け付けない。
 * 先頭に空白を足して除外指定（"-term"）のクエリを渡す（空白はクエリパーサが無視する）。
 */
function toQueryArgument(expression: string): string {
  return expression.startsWith('-') ? ` ${expression}` : expression;
}
