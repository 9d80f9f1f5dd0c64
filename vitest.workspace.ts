import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/types', 'packages/client', 'packages/mcp-server']);
