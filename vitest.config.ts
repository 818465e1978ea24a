import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    include: ['tests/**/*.test.ts'],
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      include: [
        'src/application/**',
        'src/infrastructure/crypto/**',
        'src/infrastructure/mesh/**',
        'src/infrastructure/db/**',
        'src/infrastructure/gateway/**',
        'src/infrastructure/mqtt/bus-connection.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },
  },
});
