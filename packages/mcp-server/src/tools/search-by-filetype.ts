/**
 * search_by_filetype ツール
 * MIMEタイプで絞り込んで検索する
 */

import { z } from 'zod';
import { buildFiletypeQuery } from '../query-builder.js';
import { defineIndexTool } from './define.js';
import { jsonResponse } from './response.js';
import { runSearch } from './run-search.js';

export const searchByFiletypeTool = defineIndexTool(
  {
    name: 'search_by_filetype',
    description: `Search files filtered by file type/mimetype.

Common types:
- "pdf" or "application/pdf" - PDF documents
- "text" or "text/*" - all text files
- "markdown" or "text/markdown" - Markdown files
- "doc" or "application/msword" - Word documents
- "image" or "image/*" - all images`,
    inputSchema: {
      query: z.string().describe('Search query (keywords)'),
      filetype: z
        .string()
        .describe("File type filter (e.g., 'pdf', 'markdown', 'text', 'image')"),
      max_results: z
        .number()
        .int()
        .min(0)
        .default(20)
        .describe('Maximum number of results (default: 20)'),
    },
  },
  async ({ query, filetype, max_results }, connection) => {
    const expression = buildFiletypeQuery(query, filetype);
    return jsonResponse(await runSearch(connection, expression, max_results, false));
  }
);
