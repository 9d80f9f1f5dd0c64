import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'mcp-server',
    environment: 'node',
    // 日時の整形はローカル時刻なので固定する
    env: {
      TZ: 'UTC',
    },
    // 出力設定
    reporters: ['default'],
  },
});
