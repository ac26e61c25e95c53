import swc from 'unplugin-swc';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    root: './',
    include: ['packages/*/src/**/*.spec.ts', 'services/*/src/**/*.spec.ts'],
    exclude: ['node_modules', 'dist'],
    setupFiles: ['./services/drive-explorer/test/setup.ts'],
  },
  plugins: [swc.vite()],
});
