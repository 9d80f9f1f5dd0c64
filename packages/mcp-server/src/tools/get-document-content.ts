/**
 * get_document_content ツール
 * 検索結果のURLから文書本文を取得する
 */

import { z } from 'zod';
import { readDocumentContent } from '../content.js';
import { errorLog } from '../logger.js';
import { defineFileTool } from './define.js';
import { jsonResponse, textResponse } from './response.js';

export const getDocumentContentTool = defineFileTool(
  {
    name: 'get_document_content',
    description: `Retrieve the full content of a document by its file URL.
Use this after a search to get the complete text of a specific document.`,
    inputSchema: {
      url: z.string().describe('File URL from search results (file:///path/to/file)'),
    },
  },
  async ({ url }) => {
    try {
      return jsonResponse(await readDocumentContent(url));
    } catch (error) {
      errorLog(`get_document_content failed for ${url}:`, error);
      return textResponse(`Error reading file: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
);
