/**
 * MCPプロトコルへの接続
 *
 * tools/list と tools/call をディスパッチャに振り分ける。
 * 未知のツール名もプロトコルエラーにせず、テキスト応答として返す。
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { Dispatcher } from './dispatcher.js';
import { debugLog } from './logger.js';

/**
 * サーバ情報
 */
export interface ServerInfo {
  name: string;
  version: string;
}

/**
 * ディスパッチャを公開するMCPサーバを作成
 */
export function createMcpServer(dispatcher: Dispatcher, info: ServerInfo): Server {
  const server = new Server(
    {
      name: info.name,
      version: info.version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, () => ({
    tools: dispatcher.listTools(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const response = await dispatcher.dispatch(name, args ?? {});
    return { content: response.content };
  });

  return server;
}

/**
 * stdioで待ち受けを開始
 */
export async function startServer(server: Server): Promise<void> {
  const transport = new StdioServerTransport();
  debugLog('Starting MCP server...');
  await server.connect(transport);
  debugLog('MCP server started');
}
