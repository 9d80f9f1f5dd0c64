/**
 * クライアントのエラー型
 */

/**
 * インデックスに接続できない
 */
export class IndexConnectError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'IndexConnectError';
  }
}

/**
 * recollqの実行・出力解析に失敗した
 */
export class RecollQueryError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderr: string = ''
  ) {
    super(message);
    this.name = 'RecollQueryError';
  }
}
