/**
 * search_filesystem ツール
 * キーワード・フレーズで全文検索する
 */

import { z } from 'zod';
import { buildPlainQuery } from '../query-builder.js';
import { defineIndexTool } from './define.js';
import { jsonResponse } from './response.js';
import { runSearch } from './run-search.js';

export const searchFilesystemTool = defineIndexTool(
  {
    name: 'search_filesystem',
    description: `Search the indexed filesystem using keywords or phrases.
Supports Boolean queries (AND, OR, NOT), phrase searches ("exact phrase") and wildcards.
Results are ranked by relevance.

Examples:
- "todo yubikey" - documents containing both terms
- "blog OR post" - documents containing either term
- '"exact phrase"' - exact phrase match
- "recipe NOT chocolate" - excludes documents mentioning chocolate`,
    inputSchema: {
      query: z
        .string()
        .describe('Search query using Recoll syntax (keywords, Boolean operators, phrases)'),
      max_results: z
        .number()
        .int()
        .min(0)
        .default(20)
        .describe('Maximum number of results to return (default: 20)'),
      include_preview: z
        .boolean()
        .default(true)
        .describe('Include content preview/abstract in results (default: true)'),
    },
  },
  async ({ query, max_results, include_preview }, connection) => {
    const envelope = await runSearch(connection, buildPlainQuery(query), max_results, include_preview);
    return jsonResponse(envelope);
  }
);
