import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // Ink switches to CI rendering (last frame only on exit) when CI is set;
    // keep its interactive rendering so ink-testing-library sees every frame.
    env: { CI: 'false' },
    include: ['tests/**/*.test.ts', 'tests/**/*.test.tsx'],
  },
});
