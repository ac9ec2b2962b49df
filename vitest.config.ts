import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const here = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // ワークスペースパッケージのエイリアス設定（ビルド不要でsrcを直接参照）
      '@rowguard/verdicts': here('./packages/rowguard-verdicts/src/index.ts'),
      '@rowguard/boundary': here('./packages/rowguard-boundary/src/index.ts'),
      '@rowguard/oracle': here('./packages/rowguard-oracle/src/index.ts'),
    },
  },
  test: {
    // グローバル設定
    globals: true,
    environment: 'node',

    // native モジュールは外部化
    server: {
      deps: {
        external: ['@duckdb/node-api', '@duckdb/node-bindings'],
      },
    },

    // Property-based testは時間がかかる
    testTimeout: 30000,
    hookTimeout: 30000,

    // DuckDB の :memory: インスタンスをテスト間で分離するため forks pool で順次実行
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
        isolate: true,
      },
    },
    sequence: {
      concurrent: false,
    },

    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
