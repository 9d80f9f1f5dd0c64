/**
 * インデックスのヒット（エンジン側の生データ）
 */

/**
 * Recollが返す1件分のヒット
 *
 * フィールドはエンジンが出力したままの文字列。どのフィールドも欠落し得る。
 */
export interface IndexHit {
  /** ファイル名 */
  filename?: string;
  /** file:// で始まるURL */
  url?: string;
  /** MIMEタイプ */
  mimetype?: string;
  /** ファイルサイズ（バイト数の10進表記） */
  fbytes?: string;
  /** 更新日時トークン（エンジン固有の形式） */
  mtime?: string;
  /** 抜粋（アブストラクト） */
  abstract?: string;
}
