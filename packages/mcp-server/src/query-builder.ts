/**
 * クエリ式の組み立て
 *
 * 自由文のクエリに構造化フィルタの句を固定順で連結する。
 * Recollの構文はエスケープも検証もしない（不正な式は実行時のエンジンエラーになる）。
 */

/**
 * 通常検索: クエリをそのまま使う
 */
export function buildPlainQuery(query: string): string {
  return query;
}

/**
 * 日付範囲フィルタ付き検索
 *
 * @param startDate - 開始日（YYYY-MM-DD）
 * @param endDate - 終了日（YYYY-MM-DD）
 * @returns `<query> date:<start>/<end>`。どちらも無ければクエリのみ
 */
export function buildDateRangeQuery(query: string, startDate?: string, endDate?: string): string {
  if (startDate && endDate) {
    return `${query} date:${startDate}/${endDate}`;
  }
  if (startDate) {
    return `${query} date:${startDate}/`;
  }
  if (endDate) {
    return `${query} date:/${endDate}`;
  }
  return query;
}

/**
 * ファイル種別フィルタ付き検索
 *
 * @param filetype - `pdf` のようなキーワード、または `image/*` のようなMIMEパターン
 */
export function buildFiletypeQuery(query: string, filetype: string): string {
  return `${query} mime:${filetype}`;
}

/**
 * 直近 days 日間に更新されたファイル（自由文なし）
 */
export function buildRecentQuery(days: number): string {
  return `date:${days}d/`;
}
