import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { RecollSearchConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig, type ValidatedConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 明示的に指定されたRecoll設定ディレクトリ（最優先） */
  confDir?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
  /** 環境変数（デフォルト: process.env） */
  env?: NodeJS.ProcessEnv;
}

/**
 * Config解決結果
 */
export interface ResolvedConfig {
  config: RecollSearchConfig;
  /** 読み込んだ設定ファイル（見つからなかった場合はnull） */
  configPath: string | null;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .recoll-search.json > recoll-search.json
 */
const CONFIG_FILE_NAMES = ['.recoll-search.json', 'recoll-search.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（~ は展開済み）
   */
  static async load(configPath: string): Promise<RecollSearchConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      // ファイル読み込み
      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - 設定の読み込み
   * - confDirの上書き（引数 > RECOLL_CONFDIR > 設定ファイル）
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const {
      configPath: explicitPath,
      confDir,
      traverseUp = true,
      cwd = process.cwd(),
      env = process.env,
    } = options;

    // 1. 設定ファイルパスを解決
    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp, env);

    // 2. 読み込み
    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();

    // 3. confDirの上書き
    const overrideConfDir = confDir ?? env.RECOLL_CONFDIR;
    if (overrideConfDir) {
      config.recoll.confDir = path.resolve(cwd, expandHome(overrideConfDir));
    }

    return { config, configPath };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): RecollSearchConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   * @param startDir 探索開始ディレクトリ
   * @param traverseUp 親ディレクトリを遡るかどうか
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      // 候補ファイルを順に試す
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      // 親ディレクトリへ
      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean,
    env: NodeJS.ProcessEnv
  ): Promise<string | null> {
    // 1. 明示的に指定されている
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    // 2. 環境変数
    const envPath = env.RECOLL_SEARCH_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    // 3. 自動探索
    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: ValidatedConfig): RecollSearchConfig {
    const dbDir = config.recoll?.dbDir ?? DEFAULT_CONFIG.recoll.dbDir;
    const stemLanguage = config.recoll?.stemLanguage ?? DEFAULT_CONFIG.recoll.stemLanguage;

    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      recoll: {
        confDir: expandHome(config.recoll?.confDir ?? DEFAULT_CONFIG.recoll.confDir),
        command: config.recoll?.command ?? DEFAULT_CONFIG.recoll.command,
        pageSize: config.recoll?.pageSize ?? DEFAULT_CONFIG.recoll.pageSize,
        ...(dbDir ? { dbDir: expandHome(dbDir) } : {}),
        ...(stemLanguage ? { stemLanguage } : {}),
      },
    };
  }
}

/**
 * 先頭の ~ をホームディレクトリに展開
 */
function expandHome(p: string): string {
  if (p === '~') {
    return os.homedir();
  }
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}
