import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test'
    },
    globals: true,
    include: [
      'api/**/*.test.ts',
      'cli/**/*.test.ts',
      'core/**/*.test.ts',
      'grammar/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'services/**/*.test.ts'
    ],
    exclude: ['node_modules', 'dist']
  }
});
