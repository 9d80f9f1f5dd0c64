/**
 * 文書本文の取得
 *
 * インデックスは本文を保持しないため、検索結果のURLからファイルを直接読む。
 * パスの正規化や許可ディレクトリのチェックは行わない。
 */

import { readFile } from 'fs/promises';
import type { ContentEnvelope } from '@recoll-search/types';
import { truncateText } from './utils.js';

/** 本文の最大文字数 */
export const CONTENT_MAX_CHARS = 10_000;

const FILE_SCHEME = 'file://';

/**
 * URLからファイルパスを得る
 *
 * 先頭の `file://` を取り除くだけで、URLデコードはしない。
 */
export function resolveDocumentPath(url: string): string {
  return url.startsWith(FILE_SCHEME) ? url.slice(FILE_SCHEME.length) : url;
}

// U+FFFD そのもののUTF-8表現
const REPLACEMENT_CHAR_BYTES = [0xef, 0xbf, 0xbd] as const;

/**
 * バイト列をUTF-8として読む
 *
 * 不正なバイトは捨てる。ファイル中に正しく符号化された U+FFFD とBOMは残す。
 * 改行はテキストモード読み込みと同じく \n に揃える。
 */
export function decodeText(bytes: Uint8Array): string {
  // U+FFFD の位置で区切り、区間ごとにデコードして置換文字だけを落とす
  const segments: string[] = [];
  let start = 0;
  let i = 0;

  while (i + REPLACEMENT_CHAR_BYTES.length <= bytes.length) {
    if (
      bytes[i] === REPLACEMENT_CHAR_BYTES[0] &&
      bytes[i + 1] === REPLACEMENT_CHAR_BYTES[1] &&
      bytes[i + 2] === REPLACEMENT_CHAR_BYTES[2]
    ) {
      segments.push(decodeSegment(bytes.subarray(start, i)));
      i += REPLACEMENT_CHAR_BYTES.length;
      start = i;
    } else {
      i++;
    }
  }
  segments.push(decodeSegment(bytes.subarray(start)));

  return segments.join('\uFFFD').replace(/\r\n?/g, '\n');
}

function decodeSegment(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: false, ignoreBOM: true }).decode(bytes).replace(/\uFFFD/g, '');
}

/**
 * 文書本文を読み込む
 *
 * @throws ファイルを読めない場合（呼び出し側で "Error reading file" に変換する）
 */
export async function readDocumentContent(url: string): Promise<ContentEnvelope> {
  const filepath = resolveDocumentPath(url);
  const bytes = await readFile(filepath);
  const { text, truncated } = truncateText(decodeText(bytes), CONTENT_MAX_CHARS);

  return {
    url,
    filepath,
    content: text,
    truncated,
  };
}
