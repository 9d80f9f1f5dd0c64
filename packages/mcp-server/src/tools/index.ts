/**
 * ツールレジストリ
 */

import type { RegisteredTool } from './types.js';
import { searchFilesystemTool } from './search.js';
import { searchByDateTool } from './search-by-date.js';
import { searchByFiletypeTool } from './search-by-filetype.js';
import { getDocumentContentTool } from './get-document-content.js';
import { listRecentFilesTool } from './list-recent-files.js';

/**
 * 公開するツール（カタログの並び順）
 */
export const TOOLS: readonly RegisteredTool[] = [
  searchFilesystemTool,
  searchByDateTool,
  searchByFiletypeTool,
  getDocumentContentTool,
  listRecentFilesTool,
];
