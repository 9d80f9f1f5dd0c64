/**
 * ツール応答の組み立て
 */

import type { ToolResponse } from './types.js';

/**
 * テキスト1件の応答
 */
export function textResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }] };
}

/**
 * JSON（インデント2）を埋め込んだ応答
 */
export function jsonResponse(value: unknown): ToolResponse {
  return textResponse(JSON.stringify(value, null, 2));
}
