/**
 * list_recent_files ツール
 */

import { z } from 'zod';
import type { RecentFilesEnvelope } from '@recoll-search/types';
import { buildRecentQuery } from '../query-builder.js';
import { defineIndexTool } from './define.js';
import { jsonResponse } from './response.js';
import { runSearch } from './run-search.js';

export const listRecentFilesTool = defineIndexTool(
  {
    name: 'list_recent_files',
    description: `List recently modified files in the index.
Useful for seeing what has been updated recently.`,
    inputSchema: {
      days: z
        .number()
        .int()
        .min(0)
        .default(7)
        .describe('Number of days back to search (default: 7)'),
      max_results: z
        .number()
        .int()
        .min(0)
        .default(20)
        .describe('Maximum number of results (default: 20)'),
    },
  },
  async ({ days, max_results }, connection) => {
    const envelope = await runSearch(connection, buildRecentQuery(days), max_results, false);
    const response: RecentFilesEnvelope = { days, ...envelope };
    return jsonResponse(response);
  }
);
