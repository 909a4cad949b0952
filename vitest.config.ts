import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@slotpool/core': fromRoot('./packages/core/src/index.ts'),
      '@slotpool/three': fromRoot('./packages/three/src/index.ts'),
      '@slotpool/react': fromRoot('./packages/react/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
  },
});
