import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      // 워크스페이스 패키지는 빌드 없이 소스로 테스트한다
      '@pkgpost/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/__tests__/**/*.test.ts', 'packages/*/test/**/*.test.ts'],
    exclude: ['node_modules', 'packages/*/dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
    },
  },
});
