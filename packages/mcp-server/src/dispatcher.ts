/**
 * ツールディスパッチャ
 *
 * ツール名からハンドラを引き、インデックス状態の確認・引数の検証・実行を行う。
 * どの失敗もテキスト1件の応答として返し、例外は外に出さない。
 */

import { errorLog, debugLog } from './logger.js';
import { INDEX_UNAVAILABLE_MESSAGE, type IndexState } from './state.js';
import { TOOLS } from './tools/index.js';
import { textResponse } from './tools/response.js';
import type { RegisteredTool, ToolDefinition, ToolResponse } from './tools/types.js';

/**
 * JSON Schema形式の引数定義
 */
export type ToolInputSchema = {
  type: 'object';
  properties: Record<string, ToolInputProperty>;
  required: string[];
};

export type ToolInputProperty = {
  type: 'string' | 'integer' | 'boolean';
  description?: string;
  default?: string | number | boolean;
};

/**
 * カタログの1項目
 *
 * SDKのスキーマは追加プロパティを許すため、interfaceではなく型エイリアスで書く。
 */
export type ToolCatalogEntry = {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
};

/**
 * ツール定義をJSON Schema形式の引数定義に変換
 */
export function toInputSchema(definition: ToolDefinition): ToolInputSchema {
  const properties: Record<string, ToolInputProperty> = {};
  const required: string[] = [];

  for (const param of definition.parameters) {
    const property: ToolInputProperty = { type: param.type };
    if (param.description !== undefined) property.description = param.description;
    if (param.default !== undefined) property.default = param.default;
    properties[param.name] = property;

    if (param.required) {
      required.push(param.name);
    }
  }

  return { type: 'object', properties, required };
}

export class Dispatcher {
  private readonly tools: Map<string, RegisteredTool>;

  constructor(
    private readonly index: IndexState,
    tools: readonly RegisteredTool[] = TOOLS
  ) {
    this.tools = new Map();
    for (const tool of tools) {
      if (this.tools.has(tool.definition.name)) {
        throw new Error(`Duplicate tool name: ${tool.definition.name}`);
      }
      this.tools.set(tool.definition.name, tool);
    }
  }

  /**
   * ツールカタログ
   */
  listTools(): ToolCatalogEntry[] {
    return [...this.tools.values()].map(({ definition }) => ({
      name: definition.name,
      description: definition.description,
      inputSchema: toInputSchema(definition),
    }));
  }

  /**
   * ツールを実行
   */
  async dispatch(name: string, args: Record<string, unknown> = {}): Promise<ToolResponse> {
    const tool = this.tools.get(name);
    if (!tool) {
      return textResponse(`Unknown tool: ${name}`);
    }

    const connection = this.index.status === 'connected' ? this.index.connection : null;

    // インデックスが無ければ引数に関わらず固定メッセージ
    if (tool.definition.requiresIndex && connection === null) {
      return textResponse(INDEX_UNAVAILABLE_MESSAGE);
    }

    const bound = tool.bind(args);
    if (!bound.ok) {
      return textResponse(`Invalid arguments for ${name}: ${bound.error}`);
    }

    const { invocation } = bound;
    debugLog(`Calling ${name} ${JSON.stringify(args)}`);

    try {
      if (!invocation.requiresIndex) {
        return await invocation.run();
      }

      if (connection === null) {
        return textResponse(INDEX_UNAVAILABLE_MESSAGE);
      }

      return await invocation.run(connection);
    } catch (error) {
      errorLog(`${name} failed:`, error);
      return textResponse(`Error executing search: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
