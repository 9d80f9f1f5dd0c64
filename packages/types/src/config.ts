/**
 * 設定ファイルの型定義
 */

export interface RecollSearchConfig {
  version: string;
  recoll: RecollConfig;
}

export interface RecollConfig {
  /** Recollの設定ディレクトリ（先頭の ~ はホームに展開） */
  confDir: string;
  /** インデックスDBのディレクトリ（省略時: <confDir>/xapiandb） */
  dbDir?: string;
  /** recollq コマンド */
  command: string;
  /** 1回のrecollq実行で取得するヒット数 */
  pageSize: number;
  /** ステミング言語（recollq -s） */
  stemLanguage?: string;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: RecollSearchConfig = {
  version: '1.0',
  recoll: {
    confDir: '~/.config/recoll',
    command: 'recollq',
    pageSize: 100,
  },
};
