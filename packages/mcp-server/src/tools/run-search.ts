/**
 * クエリ式の実行と結果の取得
 */

import type { DocumentHit, IndexConnection, SearchEnvelope } from '@recoll-search/types';
import { normalizeHit } from '../normalizer.js';

/**
 * クエリ式を実行し、最大 maxResults 件をエンジンの順位のまま取得する
 *
 * maxResults件・総数・エンジンが尽きた時点、のいずれか早い方で止める。
 * クエリハンドルは毎回新しく作る。
 */
export async function runSearch(
  connection: IndexConnection,
  expression: string,
  maxResults: number,
  includePreview: boolean
): Promise<SearchEnvelope> {
  const query = connection.newQuery();
  const total = await query.execute(expression);

  const limit = Math.min(maxResults, total);
  const results: DocumentHit[] = [];

  while (results.length < limit) {
    const hit = await query.fetchNext();
    if (hit === null) {
      break;
    }
    results.push(normalizeHit(hit, includePreview));
  }

  return {
    query: expression,
    total_results: total,
    returned_results: results.length,
    results,
  };
}
