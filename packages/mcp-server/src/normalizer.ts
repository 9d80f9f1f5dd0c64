/**
 * 検索結果の正規化
 */

import type { DocumentHit, IndexHit } from '@recoll-search/types';
import { formatDateTime, truncateText } from './utils.js';

/** プレビューの最大文字数 */
export const PREVIEW_MAX_CHARS = 300;

// 先頭に1文字のマーカーが付くことがある（例: "O1735732800"）
const MTIME_PATTERN = /^\D?(\d+)$/;

/**
 * 更新日時トークンを YYYY-MM-DD HH:MM:SS に変換
 *
 * 解釈できない場合は生トークンをそのまま返す（例外は投げない）。
 */
export function formatModifiedTime(raw: string): string {
  const match = MTIME_PATTERN.exec(raw);
  if (!match) {
    return raw;
  }

  const date = new Date(Number(match[1]) * 1000);
  if (Number.isNaN(date.getTime())) {
    return raw;
  }

  return formatDateTime(date);
}

function parseSize(fbytes: string | undefined): number {
  if (!fbytes) return 0;
  const size = Number(fbytes);
  return Number.isInteger(size) && size >= 0 ? size : 0;
}

/**
 * エンジンのヒットを DocumentHit に変換
 *
 * @param includePreview - 抜粋を含めるか。ヒットに抜粋が無ければ含めない
 */
export function normalizeHit(hit: IndexHit, includePreview: boolean): DocumentHit {
  const mtime = hit.mtime ?? '';

  const result: DocumentHit = {
    filename: hit.filename ?? '',
    url: hit.url ?? '',
    mimetype: hit.mimetype ?? '',
    size: parseSize(hit.fbytes),
    mtime,
    mtime_readable: formatModifiedTime(mtime),
  };

  if (includePreview && hit.abstract !== undefined) {
    result.preview = truncateText(hit.abstract, PREVIEW_MAX_CHARS).text;
  }

  return result;
}
