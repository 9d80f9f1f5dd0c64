/**
 * recollq -F の出力解析
 *
 * 先頭ページ（-n 0-N）の出力:
 *   Recoll query: <クエリの説明>
 *   N results
 *   <base64> <base64> ...   ← 1行1件、FIELD_MAPの順、空白1文字区切り
 *
 * 2ページ目以降は件数行の代わりに "Printing at most K results from first F" が出る。
 */

import type { IndexHit } from '@recoll-search/types';
import { RecollQueryError } from './errors.js';

/**
 * recollqに要求するフィールドと IndexHit のキーの対応（出力順）
 */
export const FIELD_MAP = [
  ['filename', 'filename'],
  ['url', 'url'],
  ['mtype', 'mimetype'],
  ['fbytes', 'fbytes'],
  ['mtime', 'mtime'],
  ['abstract', 'abstract'],
] as const satisfies ReadonlyArray<readonly [string, keyof IndexHit]>;

/** recollq -F に渡すフィールド名リスト */
export const RECOLLQ_FIELDS = FIELD_MAP.map(([field]) => field).join(' ');

const RESULT_COUNT_PATTERN = /^(\d+) results?\b/;

// ヒット行より前に出るヘッダ行
const HEADER_PATTERNS = [/^Recoll query:/, RESULT_COUNT_PATTERN, /^Printing at most \d+ results? from first \d+/];

/**
 * 解析結果
 */
export interface ParsedRecollqOutput {
  /** 総ヒット数 */
  total: number;
  /** このページのヒット */
  hits: IndexHit[];
}

/**
 * 先頭ページの標準出力を解析
 *
 * @throws RecollQueryError 件数行が見つからない場合
 */
export function parseRecollqOutput(stdout: string): ParsedRecollqOutput {
  const lines = stdout.split(/\r?\n/);
  const countIndex = lines.findIndex((line) => RESULT_COUNT_PATTERN.test(line.trim()));

  if (countIndex === -1) {
    throw new RecollQueryError('Unexpected recollq output: result count not found');
  }

  const match = RESULT_COUNT_PATTERN.exec(lines[countIndex].trim());
  const total = match ? parseInt(match[1], 10) : 0;

  return { total, hits: parseHitLines(lines.slice(countIndex + 1)) };
}

/**
 * 2ページ目以降の標準出力を解析
 *
 * 件数行は期待しない。ヘッダ行を読み飛ばしてヒットだけを返す。
 */
export function parseRecollqPage(stdout: string): IndexHit[] {
  const lines = stdout.split(/\r?\n/);

  let headerEnd = 0;
  lines.forEach((line, index) => {
    if (HEADER_PATTERNS.some((pattern) => pattern.test(line.trim()))) {
      headerEnd = index + 1;
    }
  });

  return parseHitLines(lines.slice(headerEnd));
}

function parseHitLines(lines: string[]): IndexHit[] {
  return lines
    .filter((line) => line.trim().length > 0 && !HEADER_PATTERNS.some((pattern) => pattern.test(line.trim())))
    .map(parseHitLine);
}

/**
 * 1行分のbase64フィールドをIndexHitに変換
 *
 * 空のフィールドは欠落として扱う。
 */
export function parseHitLine(line: string): IndexHit {
  const values = line.split(' ');
  const hit: IndexHit = {};

  FIELD_MAP.forEach(([, key], index) => {
    const encoded = values[index];
    if (!encoded) return;
    hit[key] = Buffer.from(encoded, 'base64').toString('utf-8');
  });

  return hit;
}
