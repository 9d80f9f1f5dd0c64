/**
 * 外部コマンドの実行
 */

import { spawn } from 'child_process';

/**
 * コマンドの実行結果
 */
export interface CommandResult {
  /** 終了コード（シグナルで終了した場合はnull） */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/**
 * コマンドを実行して出力を返す関数
 *
 * 起動できなかった場合はrejectする。終了コードの解釈は呼び出し側が行う。
 */
export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

/**
 * child_process.spawn によるコマンド実行
 *
 * シェルを介さず引数をそのまま渡す。タイムアウトは設けない。
 */
export const spawnCommand: CommandRunner = (command, args) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    child.stdout.on('data', (data: Buffer) => {
      stdoutChunks.push(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      stderrChunks.push(data);
    });

    child.on('error', reject);

    child.on('close', (code) => {
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString('utf-8'),
        stderr: Buffer.concat(stderrChunks).toString('utf-8'),
      });
    });
  });
