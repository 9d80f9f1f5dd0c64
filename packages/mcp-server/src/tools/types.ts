/**
 * ツールの共通型定義
 */

import type { IndexConnection } from '@recoll-search/types';

/** 引数の型 */
export type ParameterType = 'string' | 'integer' | 'boolean';

/**
 * 引数1つ分の定義
 */
export interface ParameterSpec {
  name: string;
  type: ParameterType;
  description?: string;
  required: boolean;
  default?: string | number | boolean;
}

/**
 * ツール定義（カタログとして公開する内容）
 */
export interface ToolDefinition {
  name: string;
  description: string;
  /** 定義順の引数 */
  parameters: ParameterSpec[];
  /** インデックス接続が必要か */
  requiresIndex: boolean;
}

/**
 * テキストのコンテンツ
 */
export type TextContent = {
  type: 'text';
  text: string;
};

/**
 * ツールの応答
 */
export type ToolResponse = {
  content: TextContent[];
};

/**
 * 引数を束縛した実行単位
 *
 * インデックスが必要なツールは接続を受け取って実行する。
 */
export type ToolInvocation =
  | { requiresIndex: true; run: (connection: IndexConnection) => Promise<ToolResponse> }
  | { requiresIndex: false; run: () => Promise<ToolResponse> };

/**
 * 引数の検証結果
 */
export type BindResult = { ok: true; invocation: ToolInvocation } | { ok: false; error: string };

/**
 * レジストリに登録されるツール
 */
export interface RegisteredTool {
  definition: ToolDefinition;
  /** 引数を検証してハンドラに束縛する（デフォルト値はここで適用） */
  bind(args: Record<string, unknown>): BindResult;
}
