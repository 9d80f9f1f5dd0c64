/**
 * 共通ユーティリティ関数
 */

/**
 * 切り詰め結果
 */
export interface TruncatedText {
  text: string;
  /** 元の文字列が上限を超えていたか */
  truncated: boolean;
}

/**
 * 先頭から max 文字で切る（文字 = Unicodeコードポイント）
 *
 * 単語境界は考慮しない。サロゲートペアは分割しない。
 *
 * @param text - 元の文字列
 * @param max - 最大文字数
 */
export function truncateText(text: string, max: number): TruncatedText {
  // UTF-16長が上限以下ならコードポイント数も上限以下
  if (text.length <= max) {
    return { text, truncated: false };
  }

  let count = 0;
  let end = 0;
  for (const char of text) {
    if (count === max) {
      return { text: text.slice(0, end), truncated: true };
    }
    count++;
    end += char.length;
  }

  return { text, truncated: false };
}

/**
 * 日時を YYYY-MM-DD HH:MM:SS（ローカル時刻）に整形
 */
export function formatDateTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
