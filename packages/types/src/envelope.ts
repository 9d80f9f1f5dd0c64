/**
 * ツールが返すJSONエンベロープの型定義
 *
 * content[0].text に JSON.stringify(…, null, 2) で埋め込まれる対外契約。
 */

/** 正規化済みの検索結果1件 */
export interface DocumentHit {
  filename: string;
  url: string;
  mimetype: string;
  /** バイト数 */
  size: number;
  /** エンジンの生の更新日時トークン */
  mtime: string;
  /** YYYY-MM-DD HH:MM:SS（ローカル時刻）。デコードできない場合は生トークン */
  mtime_readable: string;
  /** 抜粋（最大300文字）。要求され、かつ存在する場合のみ */
  preview?: string;
}

/** 検索系ツールの結果 */
export interface SearchEnvelope {
  /** 実際に実行したクエリ式 */
  query: string;
  total_results: number;
  returned_results: number;
  results: DocumentHit[];
}

/** list_recent_files の結果 */
export interface RecentFilesEnvelope extends SearchEnvelope {
  days: number;
}

/** get_document_content の結果 */
export interface ContentEnvelope {
  url: string;
  filepath: string;
  /** 先頭10,000文字 */
  content: string;
  truncated: boolean;
}
