/**
 * ログ出力
 *
 * stdoutはMCPプロトコルが使うため、すべてstderrに出す。
 */

/**
 * デバッグモードの判定
 */
const isDebugMode = process.env.DEBUG === '1' || process.env.NODE_ENV === 'development';

const PREFIX = '[recoll-search]';

/**
 * デバッグログ出力（デバッグモード時のみ）
 */
export function debugLog(message: string): void {
  if (isDebugMode) {
    console.error(`${PREFIX} ${message}`);
  }
}

/**
 * エラーログ出力（常に出力）
 */
export function errorLog(message: string, error?: unknown): void {
  if (error === undefined) {
    console.error(`${PREFIX} ${message}`);
  } else {
    console.error(`${PREFIX} ${message}`, error instanceof Error ? error.message : error);
  }
}
