import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],

    // テストのタイムアウト設定
    testTimeout: 30000,
    hookTimeout: 30000,

    // 出力設定: テスト失敗時のみ詳細を表示
    reporters: ['default'],

    // テスト環境
    environment: 'node',
  },
});
