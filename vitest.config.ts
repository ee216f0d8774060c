import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    // SlideSurface, ErrorDisplay and the keyboard/hash wiring need a DOM
    environment: 'jsdom',
    include: ['src/**/*.test.ts'],
  },
  esbuild: {
    target: 'es2020',
  },
});
