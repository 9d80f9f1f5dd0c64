/**
 * インデックス接続の契約
 */

import type { IndexHit } from './hit.js';

/**
 * 1回の検索を表すクエリハンドル
 *
 * execute() でカーソルを先頭ヒットに置き、fetchNext() で1件ずつ取り出す。
 * ハンドルは呼び出しごとに新しく作り、使い回さない。
 */
export interface IndexQuery {
  /**
   * クエリ式を実行する
   * @returns エンジンが報告した総ヒット数
   */
  execute(expression: string): Promise<number>;

  /**
   * 次のヒットを取得する
   * @returns ヒット。尽きた場合はnull
   */
  fetchNext(): Promise<IndexHit | null>;
}

/**
 * インデックスへの接続（プロセス中に1つだけ存在する）
 */
export interface IndexConnection {
  newQuery(): IndexQuery;
}
