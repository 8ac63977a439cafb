import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // The OAuth callback tests bind loopback ports
    testTimeout: 10000,

    // Coverage configuration
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/cli.ts', // Entrypoint, exercised by hand
      ],
      reporter: ['text', 'html', 'lcov'],
    },
  },
});
