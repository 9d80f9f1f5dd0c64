/**
 * search_by_date ツール
 * 更新日の範囲で絞り込んで検索する
 */

import { z } from 'zod';
import { buildDateRangeQuery } from '../query-builder.js';
import { defineIndexTool } from './define.js';
import { jsonResponse } from './response.js';
import { runSearch } from './run-search.js';

export const searchByDateTool = defineIndexTool(
  {
    name: 'search_by_date',
    description: `Search files filtered by modification date range.
Useful for finding recent documents or documents from a specific time period.

Examples:
- notes from last month
- documents modified in 2025
- files changed this week`,
    inputSchema: {
      query: z.string().describe('Search query (keywords)'),
      start_date: z.string().nullish().describe('Start date in YYYY-MM-DD format (optional)'),
      end_date: z.string().nullish().describe('End date in YYYY-MM-DD format (optional)'),
      max_results: z
        .number()
        .int()
        .min(0)
        .default(20)
        .describe('Maximum number of results (default: 20)'),
    },
  },
  async ({ query, start_date, end_date, max_results }, connection) => {
    const expression = buildDateRangeQuery(query, start_date ?? undefined, end_date ?? undefined);
    return jsonResponse(await runSearch(connection, expression, max_results, false));
  }
);
